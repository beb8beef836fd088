// src/models/MenuDay.ts
import { Schema, model, Document } from 'mongoose';
import { MENU_DAY_STATUSES, MenuDayStatus } from '../types/lunchmate';

export interface IMenuDish {
    index: number; // 1, 2 or 3
    mealId: string; // empty when the slot has no catalog meal yet
    name: string;
    notes: string;
}

export interface IMenuDay extends Document {
    key: number; // deterministic hash of (cookId, date)
    cookId: string;
    date: Date; // 00:00 UTC of the menu's calendar day
    status: MenuDayStatus;
    timeZone: string;
    dishes: IMenuDish[];
    publishedAt?: Date | null;
    closedAt?: Date | null;
    confirmationsCount: number;
    createdAt: Date;
    updatedAt: Date;
}

const MenuDishSchema = new Schema<IMenuDish>(
    {
        index: { type: Number, required: true, min: 1, max: 3 },
        mealId: { type: String, default: '', trim: true },
        name: { type: String, default: '', trim: true },
        notes: { type: String, default: '', trim: true },
    },
    { _id: false }
);

const MenuDaySchema = new Schema<IMenuDay>(
    {
        key: {
            type: Number,
            required: true,
            unique: true,
        },
        cookId: {
            type: String,
            required: [true, 'A menu day must belong to a cook'],
            trim: true,
        },
        date: {
            type: Date,
            required: true,
        },
        status: {
            type: String,
            enum: [...MENU_DAY_STATUSES],
            default: 'Draft',
        },
        timeZone: {
            type: String,
            default: 'UTC',
        },
        dishes: {
            type: [MenuDishSchema],
            default: [],
        },
        publishedAt: {
            type: Date,
            default: null,
        },
        closedAt: {
            type: Date,
            default: null,
        },
        confirmationsCount: {
            type: Number,
            default: 0,
            min: 0,
        },
    },
    {
        timestamps: true,
    }
);

// One menu per cook per day. Concurrent first writes rely on this index.
MenuDaySchema.index({ cookId: 1, date: 1 }, { unique: true });

const MenuDay = model<IMenuDay>('MenuDay', MenuDaySchema, 'menu_days');
export default MenuDay;
