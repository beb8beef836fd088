// src/models/Meal.ts
import { Schema, model, Document } from 'mongoose';

// Catalog entries are owned by the meal catalog; this service only reads them.
export interface IMeal extends Document<string> {
    _id: string;
    cookId: string;
    cookName?: string;
    name: string;
    description?: string;
    ingredients?: string;
    price: number;
    imageUrl?: string;
    createdAt: Date;
    updatedAt: Date;
}

const MealSchema = new Schema<IMeal>(
    {
        // Catalog ids are opaque strings issued by the catalog
        _id: {
            type: String,
            required: true,
        },
        cookId: {
            type: String,
            required: true,
            index: true,
        },
        cookName: {
            type: String,
            trim: true,
        },
        name: {
            type: String,
            required: [true, 'Meal name is required'],
            trim: true,
        },
        description: {
            type: String,
            trim: true,
        },
        ingredients: {
            type: String,
            trim: true,
        },
        price: {
            type: Number,
            required: true,
            min: 0,
        },
        imageUrl: {
            type: String,
        },
    },
    {
        timestamps: true,
    }
);

const Meal = model<IMeal>('Meal', MealSchema, 'meals');
export default Meal;
