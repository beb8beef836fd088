import jwt from 'jsonwebtoken';
import { clock } from '../src/utils/clock';
import { UserRole } from '../src/types/lunchmate';

export const day = (key: string): Date => new Date(`${key}T00:00:00.000Z`);

export const setNow = (iso: string): Date => {
    const now = new Date(iso);
    jest.spyOn(clock, 'now').mockReturnValue(now);
    return now;
};

export const duplicateKeyError = (): Error =>
    Object.assign(new Error('E11000 duplicate key error collection'), { code: 11000 });

export const tokenFor = (id: string, role: UserRole): string =>
    jwt.sign({ id, role }, 'test-secret', { expiresIn: '1h' });

export const menuDayDoc = (overrides: Record<string, unknown> = {}) => ({
    _id: 'md1',
    key: 123456,
    cookId: 'c1',
    date: day('2025-06-10'),
    status: 'Published',
    timeZone: 'UTC',
    dishes: [
        { index: 1, mealId: 'm1', name: 'Casado', notes: '' },
        { index: 2, mealId: 'm2', name: 'Olla de carne', notes: 'Friday special' },
        { index: 3, mealId: '', name: '', notes: '' },
    ],
    publishedAt: new Date('2025-06-08T12:00:00.000Z'),
    closedAt: null,
    confirmationsCount: 0,
    createdAt: new Date('2025-06-08T10:00:00.000Z'),
    updatedAt: new Date('2025-06-08T12:00:00.000Z'),
    ...overrides,
});

export const orderDoc = (overrides: Record<string, unknown> = {}) => ({
    _id: 'o1',
    customerId: 'u1',
    cookId: 'c1',
    mealId: 'm1',
    deliveryDateUtc: day('2025-06-10'),
    cancelUntilUtc: new Date('2025-06-10T08:00:00.000Z'),
    timeZone: 'UTC',
    priceAtOrder: 4500,
    status: 'Pending',
    createdAt: new Date('2025-06-09T18:00:00.000Z'),
    updatedAt: new Date('2025-06-09T18:00:00.000Z'),
    ...overrides,
});

export const mealDoc = (overrides: Record<string, unknown> = {}) => ({
    _id: 'm1',
    cookId: 'c1',
    cookName: 'Doña Ana',
    name: 'Casado',
    description: 'Rice, beans, plantain and salad',
    ingredients: 'rice, black beans, plantain',
    price: 4500,
    imageUrl: 'https://images.example.com/casado.jpg',
    ...overrides,
});
