// src/models/Review.ts
import { Schema, model, Document } from 'mongoose';

export interface IReview extends Document {
    mealId: string;
    userId: string;
    rating: number;
    comment?: string;
    createdAt: Date;
    updatedAt: Date;
}

const ReviewSchema = new Schema<IReview>(
    {
        mealId: {
            type: String,
            required: true,
        },
        userId: {
            type: String,
            required: true,
        },
        rating: {
            type: Number,
            required: true,
            min: 1,
            max: 5,
        },
        comment: {
            type: String,
            trim: true,
        },
    },
    {
        timestamps: true,
    }
);

// One review per user per meal
ReviewSchema.index({ mealId: 1, userId: 1 }, { unique: true });

const Review = model<IReview>('Review', ReviewSchema, 'reviews');
export default Review;
