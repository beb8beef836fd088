import Order from '../src/models/Order';
import Meal from '../src/models/Meal';
import { groupCookOrdersByDay, listCookOrders } from '../src/services/cookOrdersService';
import { day, mealDoc, orderDoc } from './helpers';

jest.mock('../src/models/Order');
jest.mock('../src/models/Meal');

describe('Cook orders', () => {
    beforeEach(() => {
        jest.resetAllMocks();
        (Meal.find as jest.Mock).mockResolvedValue([mealDoc()]);
    });

    describe('listCookOrders', () => {
        it('lists orders in the range with meal names', async () => {
            const sort = jest.fn().mockResolvedValue([
                orderDoc(),
                orderDoc({ _id: 'o2', customerId: 'u2', mealId: 'm3' }),
            ]);
            (Order.find as jest.Mock).mockReturnValue({ sort });

            const result = await listCookOrders('c1', '2025-06-09', '2025-06-16');

            expect(result.ok && result.value.map((row) => [row.id, row.mealName])).toEqual([
                ['o1', 'Casado'],
                ['o2', 'm3'],
            ]);
            expect(Order.find).toHaveBeenCalledWith({
                cookId: 'c1',
                deliveryDateUtc: { $gte: day('2025-06-09'), $lt: day('2025-06-16') },
            });
            expect(sort).toHaveBeenCalledWith({ deliveryDateUtc: 1 });
        });

        it('narrows to one day and one meal', async () => {
            (Order.find as jest.Mock).mockReturnValue({ sort: jest.fn().mockResolvedValue([]) });

            const result = await listCookOrders('c1', '2025-06-09', '2025-06-16', { date: '2025-06-10', mealId: 'm1' });

            expect(result).toEqual({ ok: true, value: [] });
            expect(Order.find).toHaveBeenCalledWith({ cookId: 'c1', deliveryDateUtc: day('2025-06-10'), mealId: 'm1' });
            expect(Meal.find).not.toHaveBeenCalled();
        });

        it('rejects a day filter outside the range', async () => {
            const result = await listCookOrders('c1', '2025-06-09', '2025-06-16', { date: '2025-06-16' });

            expect(result.ok ? null : result.error).toEqual({
                kind: 'InvalidArgument',
                message: 'The date filter must fall between the from and to dates.',
            });
            expect(Order.find).not.toHaveBeenCalled();
        });

        it('rejects a range that ends before it starts', async () => {
            const result = await listCookOrders('c1', '2025-06-16', '2025-06-09');

            expect(result.ok ? null : result.error).toEqual({
                kind: 'InvalidArgument',
                message: 'The to date must not be before the from date.',
            });
        });
    });

    describe('groupCookOrdersByDay', () => {
        it('counts one meal\'s orders per day and status', async () => {
            (Order.find as jest.Mock).mockResolvedValue([
                orderDoc({ _id: 'o5', deliveryDateUtc: day('2025-06-11'), status: 'Ready' }),
                orderDoc({ _id: 'o1' }),
                orderDoc({ _id: 'o2', status: 'Cancelled' }),
                orderDoc({ _id: 'o3', status: 'Delivered' }),
                orderDoc({ _id: 'o4', deliveryDateUtc: day('2025-06-11') }),
            ]);

            const result = await groupCookOrdersByDay('c1', 'm1', '2025-06-09', '2025-06-16');

            expect(result.ok && result.value).toEqual([
                { date: '2025-06-10', mealId: 'm1', mealName: 'Casado', total: 3, cancelled: 1, pending: 1, ready: 0, delivered: 1 },
                { date: '2025-06-11', mealId: 'm1', mealName: 'Casado', total: 2, cancelled: 0, pending: 1, ready: 1, delivered: 0 },
            ]);
        });

        it('requires a meal id', async () => {
            const result = await groupCookOrdersByDay('c1', '', '2025-06-09', '2025-06-16');

            expect(result.ok ? null : result.error.message).toBe('A meal id is required.');
            expect(Order.find).not.toHaveBeenCalled();
        });
    });
});
