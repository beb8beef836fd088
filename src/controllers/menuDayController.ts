// src/controllers/menuDayController.ts
import { Response } from 'express';
import asyncHandler from 'express-async-handler';
import { AuthenticatedRequest, currentUserId } from '../middleware/authMiddleware';
import AppError from '../utils/AppError';
import { unwrap } from '../utils/result';
import { DishInput, getOrCreateMenuDay, getWeek, upsertMenuDay } from '../services/menuDayService';

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const asDishes = (value: unknown): DishInput[] => {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
        throw new AppError('dishes must be an array.', 400);
    }

    return value.map((raw: unknown) => {
        if (typeof raw !== 'object' || raw === null) {
            throw new AppError('Each dish must be an object.', 400);
        }
        const dish: Record<string, unknown> = { ...raw };
        return {
            index: Number(dish.index),
            mealId: asString(dish.mealId),
            name: asString(dish.name),
            notes: asString(dish.notes),
        };
    });
};

/**
 * @desc    A cook's menu days for one week
 * @route   GET /api/v1/menu-days/week?weekStart=YYYY-MM-DD&cookId=
 * @access  Private (cooks see their own week unless cookId is given)
 */
export const getMenuWeek = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const userId = currentUserId(req);
    const cookId = asString(req.query.cookId) ?? (req.user?.role === 'cook' ? userId : undefined);

    if (!cookId) {
        throw new AppError('cookId is required.', 400);
    }

    const days = unwrap(await getWeek(cookId, asString(req.query.weekStart) ?? ''));

    res.status(200).json({
        status: 'success',
        results: days.length,
        data: { menuDays: days },
    });
});

/**
 * @desc    The cook's menu for a day, created as an empty draft on first access
 * @route   GET /api/v1/menu-days/:date
 * @access  Private (Cook only)
 */
export const getMenuDay = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const menuDay = unwrap(await getOrCreateMenuDay(currentUserId(req), req.params.date));

    res.status(200).json({ status: 'success', data: { menuDay } });
});

/**
 * @desc    Save the cook's dishes and status for a day
 * @route   PUT /api/v1/menu-days/:date
 * @access  Private (Cook only)
 */
export const saveMenuDay = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const cookId = currentUserId(req);
    const { status, timeZone } = req.body;

    const menuDay = unwrap(
        await upsertMenuDay({
            cookId,
            date: req.params.date,
            dishes: asDishes(req.body.dishes),
            status: asString(status) ?? 'Draft',
            timeZone: asString(timeZone),
        })
    );

    console.log(`[MenuDays] Cook ${cookId} saved ${menuDay.date} as ${menuDay.status}`);

    res.status(200).json({ status: 'success', data: { menuDay } });
});
