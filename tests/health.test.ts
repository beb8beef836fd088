import request from 'supertest';
import { app } from '../src/server';
import mongoose from 'mongoose';

// Mock mongoose connect
jest.spyOn(mongoose, 'connect').mockImplementation(async () => mongoose);

describe('Health Check API', () => {
    afterAll(async () => {
        await mongoose.connection.close();
    });

    it('GET /api/health should return 200', async () => {
        const res = await request(app).get('/api/health');
        expect(res.status).toBe(200);
        expect(res.body).toEqual({ status: 'API is running', environment: 'test' });
    });

    it('answers unknown routes with 404', async () => {
        const res = await request(app).get('/api/v1/lunches');
        expect(res.status).toBe(404);
        expect(res.body).toEqual({ status: 'fail', message: "Can't find /api/v1/lunches on this server!" });
    });
});
