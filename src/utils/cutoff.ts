// src/utils/cutoff.ts
import { fromZonedTime } from 'date-fns-tz';
import { ORDER_CUTOFF_HOUR } from '../config/constants';
import { LocalDayKey } from './dayKey';
import { resolveTimeZone } from './timeZone';
import { clock } from './clock';

const pad2 = (n: number): string => String(n).padStart(2, '0');

/**
 * Instant after which orders for `day` are frozen: ORDER_CUTOFF_HOUR:00 local
 * time in the given zone, converted to UTC with that zone's offset on that
 * date (DST included). Unresolvable zones are treated as UTC.
 */
export const computeCancelUntil = (day: LocalDayKey, timeZoneId: string | null | undefined): Date => {
    const { zone } = resolveTimeZone(timeZoneId);
    return fromZonedTime(`${day}T${pad2(ORDER_CUTOFF_HOUR)}:00:00`, zone);
};

/**
 * Whether the customer may still change or cancel the order.
 * The cutoff instant itself is still inside the window.
 */
export const canCancel = (order: { cancelUntilUtc: Date }, now: Date = clock.now()): boolean =>
    now.getTime() <= order.cancelUntilUtc.getTime();
