import MenuDay from '../src/models/MenuDay';
import Order from '../src/models/Order';
import Meal from '../src/models/Meal';
import Review from '../src/models/Review';
import { projectWeek } from '../src/services/weeklyProjectionService';
import { day, mealDoc, menuDayDoc, orderDoc, setNow } from './helpers';

jest.mock('../src/models/MenuDay');
jest.mock('../src/models/Order');
jest.mock('../src/models/Meal');
jest.mock('../src/models/Review');

const thursday = menuDayDoc({
    _id: 'md2',
    date: day('2025-06-12'),
    timeZone: 'America/Costa_Rica',
    dishes: [{ index: 1, mealId: 'm1', name: 'Casado', notes: '' }],
});

describe('projectWeek', () => {
    beforeEach(() => {
        jest.resetAllMocks();
        setNow('2025-06-09T15:00:00.000Z');

        (MenuDay.find as jest.Mock).mockReturnValue({ sort: jest.fn().mockResolvedValue([menuDayDoc(), thursday]) });
        (Order.find as jest.Mock).mockResolvedValue([orderDoc()]);
        (Meal.find as jest.Mock).mockResolvedValue([mealDoc()]);
        (Review.aggregate as jest.Mock).mockResolvedValue([{ _id: 'm1', average: 4.5, count: 2 }]);
    });

    it('returns the seven days from the week start', async () => {
        const result = await projectWeek('u1', 'c1', '2025-06-09');

        expect(result.ok && result.value.map((d) => d.date)).toEqual([
            '2025-06-09',
            '2025-06-10',
            '2025-06-11',
            '2025-06-12',
            '2025-06-13',
            '2025-06-14',
            '2025-06-15',
        ]);
        expect(MenuDay.find).toHaveBeenCalledWith({
            cookId: 'c1',
            date: { $gte: day('2025-06-09'), $lt: day('2025-06-16') },
        });
        expect(Order.find).toHaveBeenCalledWith({
            customerId: 'u1',
            cookId: 'c1',
            deliveryDateUtc: { $gte: day('2025-06-09'), $lt: day('2025-06-16') },
        });
        expect(Meal.find).toHaveBeenCalledWith({ _id: { $in: ['m1', 'm2'] } });
    });

    it('leaves days without a menu empty', async () => {
        const result = await projectWeek('u1', 'c1', '2025-06-09');
        if (!result.ok) throw new Error(result.error.message);

        expect(result.value[0]).toEqual({
            date: '2025-06-09',
            menuDay: null,
            order: null,
            selectedMealId: null,
            canCancel: false,
            cancelUntilUtc: null,
            dishes: [],
        });
    });

    it('joins the selection and hydrates the dishes', async () => {
        const result = await projectWeek('u1', 'c1', '2025-06-09');
        if (!result.ok) throw new Error(result.error.message);

        const tuesday = result.value[1];
        expect(tuesday.selectedMealId).toBe('m1');
        expect(tuesday.canCancel).toBe(true);
        expect(tuesday.cancelUntilUtc?.toISOString()).toBe('2025-06-10T08:00:00.000Z');
        expect(tuesday.dishes).toHaveLength(2);
        expect(tuesday.dishes[0]).toMatchObject({
            index: 1,
            mealId: 'm1',
            name: 'Casado',
            price: 4500,
            cookName: 'Doña Ana',
            averageRating: 4.5,
            totalReviews: 2,
        });
    });

    it('falls back to the slot name when the catalog lost a meal', async () => {
        const result = await projectWeek('u1', 'c1', '2025-06-09');
        if (!result.ok) throw new Error(result.error.message);

        expect(result.value[1].dishes[1]).toMatchObject({
            index: 2,
            mealId: 'm2',
            name: 'Olla de carne',
            notes: 'Friday special',
            price: 0,
            averageRating: 0,
            totalReviews: 0,
        });
    });

    it('uses the menu\'s time zone for the cutoff of a day without an order', async () => {
        const result = await projectWeek('u1', 'c1', '2025-06-09');
        if (!result.ok) throw new Error(result.error.message);

        const day3 = result.value[3];
        expect(day3.order).toBeNull();
        expect(day3.canCancel).toBe(false);
        expect(day3.cancelUntilUtc?.toISOString()).toBe('2025-06-12T14:00:00.000Z');
    });

    it('shows a cancelled order without a selection', async () => {
        (Order.find as jest.Mock).mockResolvedValue([orderDoc({ status: 'Cancelled' })]);

        const result = await projectWeek('u1', 'c1', '2025-06-09');
        if (!result.ok) throw new Error(result.error.message);

        expect(result.value[1].order?.status).toBe('Cancelled');
        expect(result.value[1].selectedMealId).toBeNull();
        expect(result.value[1].canCancel).toBe(false);
    });

    it('reports canCancel false once the cutoff has passed', async () => {
        setNow('2025-06-10T08:00:01.000Z');

        const result = await projectWeek('u1', 'c1', '2025-06-09');
        if (!result.ok) throw new Error(result.error.message);

        expect(result.value[1].selectedMealId).toBe('m1');
        expect(result.value[1].canCancel).toBe(false);
    });

    it('rejects a malformed week start', async () => {
        const result = await projectWeek('u1', 'c1', 'next monday');

        expect(result.ok ? null : result.error.kind).toBe('InvalidArgument');
        expect(MenuDay.find).not.toHaveBeenCalled();
    });
});
