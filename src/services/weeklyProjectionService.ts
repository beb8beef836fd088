// src/services/weeklyProjectionService.ts
import MenuDay from '../models/MenuDay';
import Order from '../models/Order';
import { DAYS_PER_WEEK } from '../config/constants';
import { LocalDayKey, addDays, normalizeLocalDate, utcKey } from '../utils/dayKey';
import { canCancel, computeCancelUntil } from '../utils/cutoff';
import { clock } from '../utils/clock';
import { Result, fail, ok } from '../utils/result';
import { averageRatings, getMealsByIds, ratingFor } from './mealCatalogService';
import { MenuDaySnapshot, toMenuDaySnapshot } from './menuDayService';
import { OrderSnapshot, toOrderSnapshot } from './orderService';

export interface HydratedDish {
    index: number;
    mealId: string;
    name: string;
    description?: string;
    ingredients?: string;
    price: number;
    imageUrl?: string;
    notes: string;
    cookName?: string;
    averageRating: number;
    totalReviews: number;
}

export interface DayProjection {
    date: LocalDayKey;
    menuDay: MenuDaySnapshot | null;
    order: OrderSnapshot | null;
    selectedMealId: string | null;
    canCancel: boolean;
    cancelUntilUtc: Date | null;
    dishes: HydratedDish[];
}

/**
 * A customer's view of one cook's week: for each of the 7 days, the menu
 * (if any), the customer's order (if any) and the menu's dishes joined with
 * catalog details and ratings. Read-only.
 */
export const projectWeek = async (
    customerId: string,
    cookId: string,
    weekStartLocal: string | Date
): Promise<Result<DayProjection[]>> => {
    if (!customerId?.trim() || !cookId?.trim()) {
        return fail('InvalidArgument', 'Both a customer id and a cook id are required.');
    }
    const start = normalizeLocalDate(weekStartLocal);
    if (!start) {
        return fail('InvalidArgument', 'A valid week start date (YYYY-MM-DD) is required.');
    }

    const range = { $gte: utcKey(start), $lt: utcKey(addDays(start, DAYS_PER_WEEK)) };

    const [dayDocs, orderDocs] = await Promise.all([
        MenuDay.find({ cookId, date: range }).sort({ date: 1 }),
        Order.find({ customerId, cookId, deliveryDateUtc: range }),
    ]);

    const menuByDay = new Map(dayDocs.map(toMenuDaySnapshot).map((day): [LocalDayKey, MenuDaySnapshot] => [day.date, day]));
    const orderByDay = new Map(orderDocs.map(toOrderSnapshot).map((order): [LocalDayKey, OrderSnapshot] => [order.deliveryDate, order]));

    const mealIds = [
        ...new Set(
            [...menuByDay.values()].flatMap((day) => day.dishes.map((dish) => dish.mealId)).filter((id) => id !== '')
        ),
    ];
    const [meals, ratings] = await Promise.all([getMealsByIds(mealIds), averageRatings(mealIds)]);

    const now = clock.now();
    const projection: DayProjection[] = [];

    for (let offset = 0; offset < DAYS_PER_WEEK; offset++) {
        const date = addDays(start, offset);
        const menuDay = menuByDay.get(date) ?? null;
        const order = orderByDay.get(date) ?? null;

        const dishes: HydratedDish[] = (menuDay?.dishes ?? [])
            .filter((dish) => dish.mealId !== '')
            .map((dish) => {
                const meal = meals.get(dish.mealId);
                const rating = ratingFor(ratings, dish.mealId);
                return {
                    index: dish.index,
                    mealId: dish.mealId,
                    name: meal?.name ?? dish.name,
                    description: meal?.description,
                    ingredients: meal?.ingredients,
                    price: meal?.price ?? 0,
                    imageUrl: meal?.imageUrl,
                    notes: dish.notes,
                    cookName: meal?.cookName,
                    averageRating: rating.average,
                    totalReviews: rating.count,
                };
            });

        let cancelUntilUtc: Date | null = null;
        if (order) {
            cancelUntilUtc = order.cancelUntilUtc;
        } else if (menuDay) {
            cancelUntilUtc = computeCancelUntil(date, menuDay.timeZone);
        }

        projection.push({
            date,
            menuDay,
            order,
            selectedMealId: order && order.status !== 'Cancelled' ? order.mealId : null,
            canCancel: order !== null && order.status !== 'Cancelled' && canCancel(order, now),
            cancelUntilUtc,
            dishes,
        });
    }

    return ok(projection);
};
