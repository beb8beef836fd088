// src/services/mealCatalogService.ts
import Meal, { IMeal } from '../models/Meal';
import Review from '../models/Review';

export interface MealInfo {
    id: string;
    cookId: string;
    cookName?: string;
    name: string;
    description?: string;
    ingredients?: string;
    price: number;
    imageUrl?: string;
}

export interface RatingSummary {
    average: number;
    count: number;
}

const NO_RATING: RatingSummary = Object.freeze({ average: 0, count: 0 });

const toMealInfo = (meal: IMeal): MealInfo => ({
    id: String(meal._id),
    cookId: meal.cookId,
    cookName: meal.cookName,
    name: meal.name,
    description: meal.description,
    ingredients: meal.ingredients,
    price: meal.price,
    imageUrl: meal.imageUrl,
});

/**
 * Look up a single catalog meal. Null when the catalog no longer has it.
 */
export const getMeal = async (mealId: string): Promise<MealInfo | null> => {
    const meal = await Meal.findById(mealId);
    return meal ? toMealInfo(meal) : null;
};

/**
 * Batch lookup keyed by meal id. Ids missing from the catalog are simply absent.
 */
export const getMealsByIds = async (mealIds: readonly string[]): Promise<Map<string, MealInfo>> => {
    if (mealIds.length === 0) return new Map();

    const meals = await Meal.find({ _id: { $in: [...mealIds] } });
    return new Map(meals.map((meal): [string, MealInfo] => [String(meal._id), toMealInfo(meal)]));
};

/**
 * Average rating and review count per meal, from the reviews collection.
 */
export const averageRatings = async (mealIds: readonly string[]): Promise<Map<string, RatingSummary>> => {
    if (mealIds.length === 0) return new Map();

    const rows = await Review.aggregate<{ _id: string; average: number; count: number }>([
        { $match: { mealId: { $in: [...mealIds] } } },
        { $group: { _id: '$mealId', average: { $avg: '$rating' }, count: { $sum: 1 } } },
    ]);

    return new Map(rows.map((row): [string, RatingSummary] => [row._id, { average: row.average, count: row.count }]));
};

/** Rating for one meal, 0 / 0 when nobody has reviewed it. */
export const ratingFor = (ratings: Map<string, RatingSummary>, mealId: string): RatingSummary =>
    ratings.get(mealId) ?? NO_RATING;
