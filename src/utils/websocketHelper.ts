// src/utils/websocketHelper.ts
import { Server } from 'socket.io';
import { OrderSnapshot } from '../services/orderService';

export type OrderEventName =
    | 'order_placed'
    | 'order_updated'
    | 'order_cancelled'
    | 'order_status_changed';

/** Room a cook's kitchen screens join to follow their orders. */
export const kitchenRoom = (cookId: string): string => `cook:${cookId}`;

/**
 * Push an order change to the cook's kitchen room.
 */
export const emitOrderEvent = (
    io: Server | undefined,
    eventName: OrderEventName,
    order: OrderSnapshot
) => {
    if (!io) {
        console.warn(`⚠️ Socket server unavailable; ${eventName} for order ${order.id} not broadcast`);
        return;
    }

    io.to(kitchenRoom(order.cookId)).emit(eventName, {
        order,
        timestamp: new Date(),
    });
};
