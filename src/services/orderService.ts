// src/services/orderService.ts
import { isValidObjectId } from 'mongoose';
import Order, { IOrder } from '../models/Order';
import MenuDay from '../models/MenuDay';
import { OrderStatus, isOrderStatus } from '../types/lunchmate';
import { LocalDayKey, dayKeyFromUtcKey, normalizeLocalDate, utcKey } from '../utils/dayKey';
import { canCancel, computeCancelUntil } from '../utils/cutoff';
import { resolveTimeZone } from '../utils/timeZone';
import { clock } from '../utils/clock';
import { Result, fail, ok, isDuplicateKeyError } from '../utils/result';
import { getMeal } from './mealCatalogService';
import { adjustConfirmations } from './menuDayService';

export interface OrderSnapshot {
    readonly id: string;
    readonly customerId: string;
    readonly cookId: string;
    readonly mealId: string;
    readonly deliveryDate: LocalDayKey;
    readonly deliveryDateUtc: Date;
    readonly cancelUntilUtc: Date;
    readonly timeZone: string;
    readonly priceAtOrder: number;
    readonly status: OrderStatus;
    readonly createdAt?: Date;
    readonly updatedAt?: Date;
}

export type PlacementOutcome = 'created' | 'updated' | 'reactivated';

export interface OrderPlacement {
    order: OrderSnapshot;
    outcome: PlacementOutcome;
}

export interface PlaceOrderInput {
    customerId: string;
    cookId: string;
    mealId: string;
    date: string | Date;
    timeZone?: string | null;
}

// Cook-side status moves. Delivered and Cancelled are terminal.
export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
    Pending: ['Ready', 'Delivered', 'Cancelled'],
    Ready: ['Delivered', 'Cancelled'],
    Delivered: [],
    Cancelled: [],
};

export const canTransitionOrder = (from: OrderStatus, to: OrderStatus): boolean =>
    ORDER_TRANSITIONS[from].includes(to);

export const toOrderSnapshot = (doc: IOrder): OrderSnapshot =>
    Object.freeze({
        id: String(doc._id),
        customerId: doc.customerId,
        cookId: doc.cookId,
        mealId: doc.mealId,
        deliveryDate: dayKeyFromUtcKey(doc.deliveryDateUtc),
        deliveryDateUtc: doc.deliveryDateUtc,
        cancelUntilUtc: doc.cancelUntilUtc,
        timeZone: doc.timeZone,
        priceAtOrder: doc.priceAtOrder,
        status: doc.status,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt,
    });

const required = (value: string | undefined | null, label: string): Result<string> => {
    const trimmed = value?.trim();
    return trimmed ? ok(trimmed) : fail('InvalidArgument', `${label} is required.`);
};

const parseDay = (date: string | Date): Result<LocalDayKey> => {
    const day = normalizeLocalDate(date);
    return day ? ok(day) : fail('InvalidArgument', 'A valid date (YYYY-MM-DD) is required.');
};

/**
 * Explain why a guarded write matched nothing: either the cutoff passed or
 * somebody else moved the order first.
 */
const explainLostWrite = async (orderId: unknown, now: Date, action: 'modify' | 'cancel'): Promise<Result<never>> => {
    const current = await Order.findById(orderId);
    if (!current) {
        return fail('NotFound', 'Order not found.');
    }
    if (!canCancel(current, now)) {
        return fail('CutoffExpired', `Cutoff time has passed. You cannot ${action} this order.`);
    }
    return fail('InvalidTransition', 'The order was changed by someone else. Please reload and try again.');
};

const updateBeforeCutoff = async (
    existing: IOrder,
    changes: { mealId: string; priceAtOrder: number; timeZone: string; cancelUntilUtc: Date },
    now: Date
): Promise<Result<OrderPlacement>> => {
    if (!canCancel(existing, now)) {
        return fail('CutoffExpired', 'Cutoff time has passed. You cannot modify this order.');
    }

    // Status is kept, except that a cancelled order comes back as Pending
    const reactivated = existing.status === 'Cancelled';

    // The cutoff is re-checked against the stored record as part of the write
    const updated = await Order.findOneAndUpdate(
        { _id: existing._id, status: existing.status, cancelUntilUtc: { $gte: now } },
        { $set: reactivated ? { ...changes, status: 'Pending' } : changes },
        { new: true, runValidators: true }
    );
    if (!updated) {
        return explainLostWrite(existing._id, now, 'modify');
    }

    if (reactivated) {
        await adjustConfirmations(updated.cookId, dayKeyFromUtcKey(updated.deliveryDateUtc), 1);
    }
    return ok({ order: toOrderSnapshot(updated), outcome: reactivated ? 'reactivated' : 'updated' });
};

/**
 * Place a customer's order for a cook's day, or change the one they already
 * have. The price is frozen from the catalog at this moment.
 */
export const createOrUpdateOrder = async (input: PlaceOrderInput): Promise<Result<OrderPlacement>> => {
    const customerId = required(input.customerId, 'A customer id');
    if (!customerId.ok) return customerId;
    const cookId = required(input.cookId, 'A cook id');
    if (!cookId.ok) return cookId;
    const mealId = required(input.mealId, 'A meal id');
    if (!mealId.ok) return mealId;
    const day = parseDay(input.date);
    if (!day.ok) return day;

    // 1. The day must have a menu
    const menuDay = await MenuDay.findOne({ cookId: cookId.value, date: utcKey(day.value) });
    if (!menuDay) {
        return fail('NotFound', 'No menu found for the selected day.');
    }

    // 2. ...that still takes orders and offers this meal
    if (menuDay.status === 'Closed') {
        return fail('InvalidSelection', "This day's menu is closed for orders.");
    }
    if (!menuDay.dishes.some((dish) => dish.mealId === mealId.value)) {
        return fail('InvalidSelection', "Selected meal is not part of this day's menu.");
    }

    // 3. Freeze the current catalog price
    const meal = await getMeal(mealId.value);
    if (!meal) {
        return fail('NotFound', 'Meal not found.');
    }

    // 4. Cutoff for the day in the customer's zone
    const tz = resolveTimeZone(input.timeZone);
    if (!tz.resolved && input.timeZone) {
        console.warn(`[Orders] Unknown time zone "${input.timeZone}" from customer ${customerId.value}; using ${tz.zone}.`);
    }
    const cancelUntilUtc = computeCancelUntil(day.value, tz.zone);
    const now = clock.now();

    const changes = { mealId: mealId.value, priceAtOrder: meal.price, timeZone: tz.zone, cancelUntilUtc };
    const key = { customerId: customerId.value, cookId: cookId.value, deliveryDateUtc: utcKey(day.value) };

    // 5. One order per customer, cook and day
    const existing = await Order.findOne(key);
    if (existing) {
        return updateBeforeCutoff(existing, changes, now);
    }

    if (now.getTime() > cancelUntilUtc.getTime()) {
        return fail('CutoffExpired', 'Cutoff time has passed. Orders for this day are closed.');
    }

    try {
        const created = await Order.create({ ...key, ...changes, status: 'Pending' });
        await adjustConfirmations(key.cookId, day.value, 1);
        return ok({ order: toOrderSnapshot(created), outcome: 'created' });
    } catch (err) {
        if (!isDuplicateKeyError(err)) throw err;

        // A concurrent request created it first; treat ours as an update
        const racing = await Order.findOne(key);
        if (!racing) throw err;
        return updateBeforeCutoff(racing, changes, now);
    }
};

/**
 * Cancel the customer's order for a cook's day. The record stays, with
 * status Cancelled.
 */
export const cancelOrder = async (
    customerIdInput: string,
    cookIdInput: string,
    date: string | Date
): Promise<Result<OrderSnapshot>> => {
    const customerId = required(customerIdInput, 'A customer id');
    if (!customerId.ok) return customerId;
    const cookId = required(cookIdInput, 'A cook id');
    if (!cookId.ok) return cookId;
    const day = parseDay(date);
    if (!day.ok) return day;

    const existing = await Order.findOne({
        customerId: customerId.value,
        cookId: cookId.value,
        deliveryDateUtc: utcKey(day.value),
    });
    if (!existing) {
        return fail('NotFound', 'Order not found.');
    }

    const now = clock.now();
    if (!canCancel(existing, now)) {
        return fail('CutoffExpired', 'Cutoff time has passed. You cannot cancel this order.');
    }
    if (existing.status === 'Cancelled') {
        return ok(toOrderSnapshot(existing));
    }
    if (existing.status === 'Delivered') {
        return fail('InvalidTransition', 'A delivered order cannot be cancelled.');
    }

    const updated = await Order.findOneAndUpdate(
        { _id: existing._id, status: existing.status, cancelUntilUtc: { $gte: now } },
        { $set: { status: 'Cancelled' } },
        { new: true }
    );
    if (!updated) {
        return explainLostWrite(existing._id, now, 'cancel');
    }

    await adjustConfirmations(cookId.value, day.value, -1);
    return ok(toOrderSnapshot(updated));
};

/**
 * Cook-side status change (preparing, delivering, or calling an order off).
 * Not cutoff-gated.
 */
export const advanceOrderStatus = async (
    cookId: string,
    orderId: string,
    nextStatus: string
): Promise<Result<OrderSnapshot>> => {
    if (!isOrderStatus(nextStatus)) {
        return fail('InvalidArgument', `Unknown order status "${nextStatus}".`);
    }
    if (!isValidObjectId(orderId)) {
        return fail('NotFound', 'Order not found.');
    }

    const order = await Order.findOne({ _id: orderId, cookId });
    if (!order) {
        return fail('NotFound', 'Order not found.');
    }
    if (!canTransitionOrder(order.status, nextStatus)) {
        return fail('InvalidTransition', `An order cannot move from ${order.status} to ${nextStatus}.`);
    }

    const updated = await Order.findOneAndUpdate(
        { _id: order._id, status: order.status },
        { $set: { status: nextStatus } },
        { new: true }
    );
    if (!updated) {
        return fail('InvalidTransition', 'The order was changed by someone else. Please reload and try again.');
    }

    if (nextStatus === 'Cancelled') {
        await adjustConfirmations(updated.cookId, dayKeyFromUtcKey(updated.deliveryDateUtc), -1);
    }
    return ok(toOrderSnapshot(updated));
};

/**
 * A customer's orders with delivery days in [from, to), optionally for one cook.
 */
export const listMyOrders = async (
    customerId: string,
    from: string | Date,
    to: string | Date,
    cookId?: string
): Promise<Result<OrderSnapshot[]>> => {
    const start = parseDay(from);
    if (!start.ok) return start;
    const end = parseDay(to);
    if (!end.ok) return end;

    const orders = await Order.find({
        customerId,
        deliveryDateUtc: { $gte: utcKey(start.value), $lt: utcKey(end.value) },
        ...(cookId ? { cookId } : {}),
    }).sort({ deliveryDateUtc: 1 });

    return ok(orders.map(toOrderSnapshot));
};

/** Delivered and cancelled orders, most recent first. */
export const getOrderHistory = async (customerId: string): Promise<OrderSnapshot[]> => {
    const orders = await Order.find({
        customerId,
        status: { $in: ['Delivered', 'Cancelled'] },
    }).sort({ createdAt: -1 });

    return orders.map(toOrderSnapshot);
};
