// MANDATORY: UPPER_SNAKE_CASE for Global Constants
// The secret used to verify the bearer tokens issued by the identity service.
if (!process.env.JWT_SECRET) {
    throw new Error('FATAL: JWT_SECRET environment variable is missing.');
}

export const JWT_SECRET: string = process.env.JWT_SECRET;

// Local wall-clock hour after which a day's orders are frozen for customers.
export const ORDER_CUTOFF_HOUR: number = 8;

// Zone used when a caller sends no time zone, or one we cannot resolve.
export const DEFAULT_TIME_ZONE: string = 'UTC';

// Every menu day carries exactly this many dish slots, indexed from 1.
export const DISH_SLOT_COUNT: number = 3;

// Number of days covered by a weekly view.
export const DAYS_PER_WEEK: number = 7;

// Attempts made by compare-and-set updates before giving up.
export const MAX_WRITE_ATTEMPTS: number = 3;
