import request from 'supertest';
import mongoose from 'mongoose';
import { app } from '../src/server';
import MenuDay from '../src/models/MenuDay';
import { menuDayDoc, setNow, tokenFor } from './helpers';

jest.mock('../src/models/MenuDay');

// Mock mongoose connect to prevent actual connection
jest.spyOn(mongoose, 'connect').mockImplementation(async () => mongoose);

const cook = `Bearer ${tokenFor('c1', 'cook')}`;
const customer = `Bearer ${tokenFor('u1', 'customer')}`;

describe('Menu days API', () => {
    afterAll(async () => {
        await mongoose.connection.close();
    });

    beforeEach(() => {
        jest.resetAllMocks();
        setNow('2025-06-09T15:00:00.000Z');
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    it('publishes a new day with three dish slots', async () => {
        (MenuDay.findOne as jest.Mock).mockResolvedValue(null);
        (MenuDay.create as jest.Mock).mockImplementation(async (doc: Record<string, unknown>) => ({ _id: 'md1', ...doc }));

        const res = await request(app)
            .put('/api/v1/menu-days/2025-06-10')
            .set('Authorization', cook)
            .send({ status: 'Published', dishes: [{ index: 1, mealId: 'm1', name: 'Casado' }] });

        expect(res.status).toBe(200);
        expect(res.body.data.menuDay.status).toBe('Published');
        expect(res.body.data.menuDay.date).toBe('2025-06-10');
        expect(res.body.data.menuDay.dishes.map((d: { mealId: string }) => d.mealId)).toEqual(['m1', '', '']);
        expect(res.body.data.menuDay.publishedAt).toBe('2025-06-09T15:00:00.000Z');
    });

    it('returns 409 when a closed day is reopened', async () => {
        (MenuDay.findOne as jest.Mock).mockResolvedValue(menuDayDoc({ status: 'Closed' }));

        const res = await request(app)
            .put('/api/v1/menu-days/2025-06-10')
            .set('Authorization', cook)
            .send({ status: 'Published' });

        expect(res.status).toBe(409);
        expect(res.body.message).toBe('A Closed menu cannot be moved back to Published.');
    });

    it('rejects dishes that are not an array', async () => {
        const res = await request(app)
            .put('/api/v1/menu-days/2025-06-10')
            .set('Authorization', cook)
            .send({ status: 'Draft', dishes: 'Casado' });

        expect(res.status).toBe(400);
        expect(res.body.message).toBe('dishes must be an array.');
        expect(MenuDay.findOne).not.toHaveBeenCalled();
    });

    it('only lets cooks edit days', async () => {
        const res = await request(app).put('/api/v1/menu-days/2025-06-10').set('Authorization', customer).send({});

        expect(res.status).toBe(403);
    });

    it('lets customers browse a cook\'s week', async () => {
        (MenuDay.find as jest.Mock).mockReturnValue({ sort: jest.fn().mockResolvedValue([menuDayDoc()]) });

        const res = await request(app)
            .get('/api/v1/menu-days/week?cookId=c1&weekStart=2025-06-09')
            .set('Authorization', customer);

        expect(res.status).toBe(200);
        expect(res.body.results).toBe(1);
        expect(res.body.data.menuDays[0].date).toBe('2025-06-10');
    });

    it('needs a cook id when a customer browses', async () => {
        const res = await request(app).get('/api/v1/menu-days/week?weekStart=2025-06-09').set('Authorization', customer);

        expect(res.status).toBe(400);
        expect(res.body.message).toBe('cookId is required.');
    });
});
