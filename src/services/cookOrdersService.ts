// src/services/cookOrdersService.ts
import Order from '../models/Order';
import { OrderStatus } from '../types/lunchmate';
import { LocalDayKey, dayKeyFromUtcKey, normalizeLocalDate, utcKey } from '../utils/dayKey';
import { Result, fail, ok } from '../utils/result';
import { getMealsByIds } from './mealCatalogService';

export interface CookOrderRow {
    id: string;
    deliveryDate: LocalDayKey;
    customerId: string;
    mealId: string;
    mealName: string;
    status: OrderStatus;
    priceAtOrder: number;
    createdAt?: Date;
}

export interface CookOrderGroup {
    date: LocalDayKey;
    mealId: string;
    mealName: string;
    total: number;
    cancelled: number;
    pending: number;
    ready: number;
    delivered: number;
}

export interface CookOrderFilters {
    date?: string;
    mealId?: string;
}

const parseRange = (from: string | Date, to: string | Date): Result<{ start: LocalDayKey; end: LocalDayKey }> => {
    const start = normalizeLocalDate(from);
    const end = normalizeLocalDate(to);
    if (!start || !end) {
        return fail('InvalidArgument', 'Valid from and to dates (YYYY-MM-DD) are required.');
    }
    if (end < start) {
        return fail('InvalidArgument', 'The to date must not be before the from date.');
    }
    return ok({ start, end });
};

/**
 * The cook's orders with delivery days in [from, to), optionally narrowed to
 * one day and/or one meal, with meal names filled in from the catalog.
 */
export const listCookOrders = async (
    cookId: string,
    from: string | Date,
    to: string | Date,
    filters: CookOrderFilters = {}
): Promise<Result<CookOrderRow[]>> => {
    const range = parseRange(from, to);
    if (!range.ok) return range;

    let deliveryDateUtc: Date | { $gte: Date; $lt: Date } = {
        $gte: utcKey(range.value.start),
        $lt: utcKey(range.value.end),
    };
    if (filters.date) {
        const day = normalizeLocalDate(filters.date);
        if (!day) return fail('InvalidArgument', 'The date filter must be a valid date (YYYY-MM-DD).');
        if (day < range.value.start || day >= range.value.end) {
            return fail('InvalidArgument', 'The date filter must fall between the from and to dates.');
        }
        deliveryDateUtc = utcKey(day);
    }

    const orders = await Order.find({
        cookId,
        deliveryDateUtc,
        ...(filters.mealId ? { mealId: filters.mealId } : {}),
    }).sort({ deliveryDateUtc: 1 });

    if (orders.length === 0) return ok([]);

    const meals = await getMealsByIds([...new Set(orders.map((order) => order.mealId))]);

    return ok(
        orders.map((order) => ({
            id: String(order._id),
            deliveryDate: dayKeyFromUtcKey(order.deliveryDateUtc),
            customerId: order.customerId,
            mealId: order.mealId,
            mealName: meals.get(order.mealId)?.name ?? order.mealId,
            status: order.status,
            priceAtOrder: order.priceAtOrder,
            createdAt: order.createdAt,
        }))
    );
};

/**
 * Per-day counts of one meal's orders by status, for the kitchen's prep list.
 */
export const groupCookOrdersByDay = async (
    cookId: string,
    mealId: string,
    from: string | Date,
    to: string | Date
): Promise<Result<CookOrderGroup[]>> => {
    if (!mealId?.trim()) {
        return fail('InvalidArgument', 'A meal id is required.');
    }
    const range = parseRange(from, to);
    if (!range.ok) return range;

    const orders = await Order.find({
        cookId,
        mealId,
        deliveryDateUtc: { $gte: utcKey(range.value.start), $lt: utcKey(range.value.end) },
    });

    if (orders.length === 0) return ok([]);

    const meals = await getMealsByIds([mealId]);
    const mealName = meals.get(mealId)?.name ?? '(meal)';

    const groups = new Map<LocalDayKey, CookOrderGroup>();
    for (const order of orders) {
        const date = dayKeyFromUtcKey(order.deliveryDateUtc);
        const group = groups.get(date) ?? {
            date,
            mealId,
            mealName,
            total: 0,
            cancelled: 0,
            pending: 0,
            ready: 0,
            delivered: 0,
        };

        group.total += 1;
        switch (order.status) {
            case 'Cancelled':
                group.cancelled += 1;
                break;
            case 'Pending':
                group.pending += 1;
                break;
            case 'Ready':
                group.ready += 1;
                break;
            case 'Delivered':
                group.delivered += 1;
                break;
        }
        groups.set(date, group);
    }

    return ok([...groups.values()].sort((a, b) => a.date.localeCompare(b.date)));
};
