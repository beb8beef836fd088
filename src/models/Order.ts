// src/models/Order.ts
import { Schema, model, Document } from 'mongoose';
import { ORDER_STATUSES, OrderStatus } from '../types/lunchmate';

export interface IOrder extends Document {
    customerId: string;
    cookId: string;
    mealId: string;
    deliveryDateUtc: Date; // 00:00 UTC of the delivery day
    cancelUntilUtc: Date;
    timeZone: string;
    priceAtOrder: number; // frozen when the order is placed or changed
    status: OrderStatus;
    createdAt: Date;
    updatedAt: Date;
}

const OrderSchema = new Schema<IOrder>(
    {
        customerId: {
            type: String,
            required: true,
            trim: true,
        },
        cookId: {
            type: String,
            required: true,
            trim: true,
        },
        mealId: {
            type: String,
            required: [true, 'An order must reference a meal'],
        },
        deliveryDateUtc: {
            type: Date,
            required: true,
        },
        cancelUntilUtc: {
            type: Date,
            required: true,
        },
        timeZone: {
            type: String,
            default: 'UTC',
        },
        priceAtOrder: {
            type: Number,
            required: true,
            min: 0,
        },
        status: {
            type: String,
            enum: [...ORDER_STATUSES],
            default: 'Pending',
            index: true,
        },
    },
    {
        timestamps: true,
    }
);

// At most one order per customer per cook per day
OrderSchema.index({ customerId: 1, cookId: 1, deliveryDateUtc: 1 }, { unique: true });
// Kitchen views scan a cook's orders by day
OrderSchema.index({ cookId: 1, deliveryDateUtc: 1 });

const Order = model<IOrder>('Order', OrderSchema, 'orders');
export default Order;
