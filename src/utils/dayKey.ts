// src/utils/dayKey.ts
import { isValid, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAY_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:$|[T ])/;

/**
 * A calendar day written as YYYY-MM-DD. It names "which day", not an instant.
 */
export type LocalDayKey = string;

/**
 * Strip time-of-day and any zone from a date.
 *
 * Strings keep the calendar date they were written with, so
 * `2025-06-10T23:30:00-06:00` is 2025-06-10 even though that instant is
 * already the 11th in UTC. Date objects are read through their UTC fields.
 * Returns null for malformed or impossible dates.
 */
export const normalizeLocalDate = (input: string | Date): LocalDayKey | null => {
    if (input instanceof Date) {
        return isValid(input) ? formatInTimeZone(input, 'UTC', 'yyyy-MM-dd') : null;
    }

    const match = DAY_PREFIX.exec(input.trim());
    if (!match) return null;

    // parseISO rejects impossible days such as 2025-02-30
    return isValid(parseISO(match[1])) ? match[1] : null;
};

/**
 * Storage key for a day: 00:00 UTC on the same calendar date.
 * This is a partition key, not a time-zone conversion.
 */
export const utcKey = (day: LocalDayKey): Date => new Date(`${day}T00:00:00.000Z`);

/** Inverse of utcKey. */
export const dayKeyFromUtcKey = (date: Date): LocalDayKey => formatInTimeZone(date, 'UTC', 'yyyy-MM-dd');

export const addDays = (day: LocalDayKey, amount: number): LocalDayKey =>
    dayKeyFromUtcKey(new Date(utcKey(day).getTime() + amount * MS_PER_DAY));
