// src/services/menuDayService.ts
import { createHash } from 'crypto';
import MenuDay, { IMenuDay, IMenuDish } from '../models/MenuDay';
import { DAYS_PER_WEEK, DEFAULT_TIME_ZONE, DISH_SLOT_COUNT, MAX_WRITE_ATTEMPTS } from '../config/constants';
import { MenuDayStatus, isMenuDayStatus } from '../types/lunchmate';
import { LocalDayKey, addDays, dayKeyFromUtcKey, normalizeLocalDate, utcKey } from '../utils/dayKey';
import { resolveTimeZone } from '../utils/timeZone';
import { clock } from '../utils/clock';
import { Result, fail, ok, isDuplicateKeyError } from '../utils/result';

export interface DishInput {
    index: number;
    mealId?: string | null;
    name?: string | null;
    notes?: string | null;
}

export interface MenuDaySnapshot {
    readonly id: string;
    readonly key: number;
    readonly cookId: string;
    readonly date: LocalDayKey;
    readonly status: MenuDayStatus;
    readonly timeZone: string;
    readonly dishes: readonly Readonly<IMenuDish>[];
    readonly publishedAt: Date | null;
    readonly closedAt: Date | null;
    readonly confirmationsCount: number;
    readonly createdAt?: Date;
    readonly updatedAt?: Date;
}

export interface UpsertMenuDayInput {
    cookId: string;
    date: string | Date;
    dishes: readonly DishInput[];
    status: string;
    timeZone?: string | null;
}

// Draft -> Published -> Closed, or Draft -> Closed. Re-saving a status is always allowed.
const MENU_DAY_TRANSITIONS: Record<MenuDayStatus, readonly MenuDayStatus[]> = {
    Draft: ['Draft', 'Published', 'Closed'],
    Published: ['Published', 'Closed'],
    Closed: ['Closed'],
};

export const canTransitionMenuDay = (from: MenuDayStatus, to: MenuDayStatus): boolean =>
    MENU_DAY_TRANSITIONS[from].includes(to);

const emptyDish = (index: number): IMenuDish => ({ index, mealId: '', name: '', notes: '' });

/**
 * Exactly DISH_SLOT_COUNT slots, indexed 1..N in order. Missing slots are
 * synthesized empty; out-of-range indexes and repeats of an index are dropped.
 * Idempotent.
 */
export const ensureThreeDishes = (dishes: readonly DishInput[]): IMenuDish[] => {
    const byIndex = new Map<number, IMenuDish>();

    for (const dish of dishes) {
        const { index } = dish;
        if (!Number.isInteger(index) || index < 1 || index > DISH_SLOT_COUNT || byIndex.has(index)) {
            continue;
        }
        byIndex.set(index, {
            index,
            mealId: dish.mealId?.trim() ?? '',
            name: dish.name?.trim() ?? '',
            notes: dish.notes?.trim() ?? '',
        });
    }

    const slots: IMenuDish[] = [];
    for (let index = 1; index <= DISH_SLOT_COUNT; index++) {
        slots.push(byIndex.get(index) ?? emptyDish(index));
    }
    return slots;
};

/**
 * Stable integer key for (cookId, day): the first 48 bits of a SHA-256
 * digest. The unique index on (cookId, date) is what guarantees uniqueness.
 */
export const menuDayKey = (cookId: string, day: LocalDayKey): number =>
    parseInt(createHash('sha256').update(`${cookId}|${day}`).digest('hex').slice(0, 12), 16);

export const toMenuDaySnapshot = (doc: IMenuDay): MenuDaySnapshot =>
    Object.freeze({
        id: String(doc._id),
        key: doc.key,
        cookId: doc.cookId,
        date: dayKeyFromUtcKey(doc.date),
        status: doc.status,
        timeZone: doc.timeZone || DEFAULT_TIME_ZONE,
        dishes: Object.freeze(ensureThreeDishes(doc.dishes ?? [])),
        publishedAt: doc.publishedAt ?? null,
        closedAt: doc.closedAt ?? null,
        confirmationsCount: doc.confirmationsCount ?? 0,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt,
    });

const requireCookAndDay = (cookId: string, date: string | Date): Result<{ cookId: string; day: LocalDayKey }> => {
    const trimmed = cookId?.trim();
    if (!trimmed) {
        return fail('InvalidArgument', 'A cook id is required.');
    }
    const day = normalizeLocalDate(date);
    if (!day) {
        return fail('InvalidArgument', 'A valid date (YYYY-MM-DD) is required.');
    }
    return ok({ cookId: trimmed, day });
};

/**
 * Fetch the cook's menu for a day, creating an empty Draft the first time.
 * Two first-time callers racing on the same day both end up with the one
 * record the unique index let through.
 */
export const getOrCreateMenuDay = async (cookId: string, date: string | Date): Promise<Result<MenuDaySnapshot>> => {
    const target = requireCookAndDay(cookId, date);
    if (!target.ok) return target;

    const { day } = target.value;
    const filter = { cookId: target.value.cookId, date: utcKey(day) };

    try {
        const doc = await MenuDay.findOneAndUpdate(
            filter,
            {
                $setOnInsert: {
                    key: menuDayKey(filter.cookId, day),
                    status: 'Draft',
                    timeZone: DEFAULT_TIME_ZONE,
                    dishes: ensureThreeDishes([]),
                    publishedAt: null,
                    closedAt: null,
                    confirmationsCount: 0,
                },
            },
            { upsert: true, new: true, setDefaultsOnInsert: true }
        );
        if (!doc) {
            throw new Error(`Upsert of menu day ${filter.cookId}/${day} returned no document`);
        }
        return ok(toMenuDaySnapshot(doc));
    } catch (err) {
        if (!isDuplicateKeyError(err)) throw err;

        // Lost the insert race; the winner's record is the one to use
        const existing = await MenuDay.findOne(filter);
        if (!existing) throw err;
        return ok(toMenuDaySnapshot(existing));
    }
};

/**
 * Save a cook's menu for a day. Cook edits are not cutoff-gated; only the
 * status lifecycle is enforced.
 */
export const upsertMenuDay = async (input: UpsertMenuDayInput): Promise<Result<MenuDaySnapshot>> => {
    const target = requireCookAndDay(input.cookId, input.date);
    if (!target.ok) return target;

    const { cookId, day } = target.value;
    const { status } = input;
    if (!isMenuDayStatus(status)) {
        return fail('InvalidArgument', `Unknown menu status "${status}".`);
    }

    const tz = resolveTimeZone(input.timeZone);
    if (!tz.resolved && input.timeZone) {
        console.warn(`[MenuDays] Unknown time zone "${input.timeZone}" for cook ${cookId}; using ${tz.zone}.`);
    }

    const dishes = ensureThreeDishes(input.dishes);
    const filter = { cookId, date: utcKey(day) };

    for (let attempt = 0; attempt < MAX_WRITE_ATTEMPTS; attempt++) {
        const now = clock.now();
        const existing = await MenuDay.findOne(filter);

        if (!existing) {
            try {
                const created = await MenuDay.create({
                    key: menuDayKey(cookId, day),
                    cookId,
                    date: filter.date,
                    status,
                    timeZone: tz.zone,
                    dishes,
                    publishedAt: status === 'Published' ? now : null,
                    closedAt: null,
                    confirmationsCount: 0,
                });
                return ok(toMenuDaySnapshot(created));
            } catch (err) {
                if (!isDuplicateKeyError(err)) throw err;
                // Someone created it first: go round again and update theirs
                continue;
            }
        }

        if (!canTransitionMenuDay(existing.status, status)) {
            return fail('InvalidTransition', `A ${existing.status} menu cannot be moved back to ${status}.`);
        }

        const enteringPublished = status === 'Published' && existing.status !== 'Published';
        const publishedAt = enteringPublished ? existing.publishedAt ?? now : existing.publishedAt ?? null;

        let closedAt: Date | null = null;
        if (status === 'Closed') {
            closedAt = existing.status === 'Closed' ? existing.closedAt ?? now : now;
        }

        // Compare-and-set on the status we read, so the timestamps above
        // were derived from the state we are replacing
        const updated = await MenuDay.findOneAndUpdate(
            { _id: existing._id, status: existing.status },
            { $set: { dishes, status, timeZone: tz.zone, publishedAt, closedAt } },
            { new: true, runValidators: true }
        );
        if (updated) return ok(toMenuDaySnapshot(updated));
    }

    throw new Error(`Menu day ${cookId}/${day} kept changing during the update`);
};

/**
 * The cook's existing menu days for the 7 days starting at weekStartLocal.
 */
export const getWeek = async (cookId: string, weekStartLocal: string | Date): Promise<Result<MenuDaySnapshot[]>> => {
    const target = requireCookAndDay(cookId, weekStartLocal);
    if (!target.ok) return target;

    const start = target.value.day;
    const days = await MenuDay.find({
        cookId: target.value.cookId,
        date: { $gte: utcKey(start), $lt: utcKey(addDays(start, DAYS_PER_WEEK)) },
    }).sort({ date: 1 });

    return ok(days.map(toMenuDaySnapshot));
};

/**
 * Keep confirmationsCount in step with the number of live orders for a day.
 */
export const adjustConfirmations = async (cookId: string, day: LocalDayKey, delta: 1 | -1): Promise<void> => {
    if (delta < 0) {
        // never below zero
        await MenuDay.updateOne(
            { cookId, date: utcKey(day), confirmationsCount: { $gt: 0 } },
            { $inc: { confirmationsCount: delta } }
        );
        return;
    }

    await MenuDay.updateOne({ cookId, date: utcKey(day) }, { $inc: { confirmationsCount: delta } });
};
