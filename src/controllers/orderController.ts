// src/controllers/orderController.ts
import { Response } from 'express';
import asyncHandler from 'express-async-handler';
import { AuthenticatedRequest, currentUserId } from '../middleware/authMiddleware';
import AppError from '../utils/AppError';
import { unwrap } from '../utils/result';
import { emitOrderEvent, OrderEventName } from '../utils/websocketHelper';
import {
    PlacementOutcome,
    advanceOrderStatus,
    cancelOrder as cancelCustomerOrder,
    createOrUpdateOrder,
    getOrderHistory,
    listMyOrders,
} from '../services/orderService';
import { projectWeek } from '../services/weeklyProjectionService';
import { groupCookOrdersByDay, listCookOrders } from '../services/cookOrdersService';

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const requireQuery = (req: AuthenticatedRequest, name: string): string => {
    const value = asString(req.query[name]);
    if (!value) {
        throw new AppError(`Query parameter "${name}" is required.`, 400);
    }
    return value;
};

const PLACEMENT_EVENTS: Record<PlacementOutcome, OrderEventName> = {
    created: 'order_placed',
    updated: 'order_updated',
    reactivated: 'order_placed',
};

// --- CUSTOMER ---

/**
 * @desc    A cook's week with the customer's selections and hydrated dishes
 * @route   GET /api/v1/orders/week?cookId=&weekStart=YYYY-MM-DD
 * @access  Private (Customer only)
 */
export const getWeekWithSelections = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const days = unwrap(
        await projectWeek(currentUserId(req), requireQuery(req, 'cookId'), requireQuery(req, 'weekStart'))
    );

    res.status(200).json({ status: 'success', results: days.length, data: { days } });
});

/**
 * @desc    The customer's orders in a date range
 * @route   GET /api/v1/orders/mine?from=&to=&cookId=
 * @access  Private (Customer only)
 */
export const getMyOrders = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const orders = unwrap(
        await listMyOrders(
            currentUserId(req),
            requireQuery(req, 'from'),
            requireQuery(req, 'to'),
            asString(req.query.cookId)
        )
    );

    res.status(200).json({ status: 'success', results: orders.length, data: { orders } });
});

/**
 * @desc    Delivered and cancelled orders
 * @route   GET /api/v1/orders/history
 * @access  Private (Customer only)
 */
export const getMyOrderHistory = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const orders = await getOrderHistory(currentUserId(req));

    res.status(200).json({ status: 'success', results: orders.length, data: { orders } });
});

/**
 * @desc    Place an order, or change the existing one before the cutoff
 * @route   POST /api/v1/orders
 * @access  Private (Customer only)
 */
export const placeOrder = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const { cookId, mealId, date, timeZone } = req.body;

    const placement = unwrap(
        await createOrUpdateOrder({
            customerId: currentUserId(req),
            cookId: asString(cookId) ?? '',
            mealId: asString(mealId) ?? '',
            date: asString(date) ?? '',
            timeZone: asString(timeZone),
        })
    );

    console.log(`[Orders] Order ${placement.order.id} ${placement.outcome} for ${placement.order.deliveryDate}`);
    emitOrderEvent(req.app.get('io'), PLACEMENT_EVENTS[placement.outcome], placement.order);

    res.status(placement.outcome === 'created' ? 201 : 200).json({
        status: 'success',
        data: { order: placement.order, outcome: placement.outcome },
    });
});

/**
 * @desc    Cancel the customer's order for a cook's day
 * @route   DELETE /api/v1/orders/:cookId/:date
 * @access  Private (Customer only)
 */
export const cancelOrder = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const order = unwrap(await cancelCustomerOrder(currentUserId(req), req.params.cookId, req.params.date));

    emitOrderEvent(req.app.get('io'), 'order_cancelled', order);

    res.status(200).json({ status: 'success', message: 'Order cancelled.', data: { order } });
});

// --- COOK ---

/**
 * @desc    The cook's orders in a date range, optionally for one day or meal
 * @route   GET /api/v1/orders/cook?from=&to=&date=&mealId=
 * @access  Private (Cook only)
 */
export const getCookOrders = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const orders = unwrap(
        await listCookOrders(currentUserId(req), requireQuery(req, 'from'), requireQuery(req, 'to'), {
            date: asString(req.query.date),
            mealId: asString(req.query.mealId),
        })
    );

    res.status(200).json({ status: 'success', results: orders.length, data: { orders } });
});

/**
 * @desc    Per-day status counts for one meal
 * @route   GET /api/v1/orders/cook/grouped?mealId=&from=&to=
 * @access  Private (Cook only)
 */
export const getCookOrderGroups = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const groups = unwrap(
        await groupCookOrdersByDay(
            currentUserId(req),
            requireQuery(req, 'mealId'),
            requireQuery(req, 'from'),
            requireQuery(req, 'to')
        )
    );

    res.status(200).json({ status: 'success', results: groups.length, data: { groups } });
});

/**
 * @desc    Move an order along Pending -> Ready -> Delivered, or call it off
 * @route   PATCH /api/v1/orders/:id/status
 * @access  Private (Cook only)
 */
export const updateOrderStatus = asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
    const order = unwrap(
        await advanceOrderStatus(currentUserId(req), req.params.id, asString(req.body.status) ?? '')
    );

    emitOrderEvent(req.app.get('io'), 'order_status_changed', order);

    res.status(200).json({ status: 'success', data: { order } });
});
