// src/utils/timeZone.ts
import { DEFAULT_TIME_ZONE } from '../config/constants';

export interface ResolvedTimeZone {
    /** IANA zone name safe to hand to date-fns-tz */
    zone: string;
    /** false when the requested identifier was unusable and we fell back */
    resolved: boolean;
}

/**
 * Resolve an IANA time-zone identifier. Unknown, empty or malformed
 * identifiers fall back to UTC; this never throws.
 */
export const resolveTimeZone = (timeZoneId: string | null | undefined): ResolvedTimeZone => {
    const candidate = timeZoneId?.trim();
    if (!candidate) {
        return { zone: DEFAULT_TIME_ZONE, resolved: false };
    }

    try {
        // The constructor throws a RangeError for zones the runtime does not know
        const zone = new Intl.DateTimeFormat('en-US', { timeZone: candidate }).resolvedOptions().timeZone;
        return { zone, resolved: true };
    } catch (err) {
        if (err instanceof RangeError) {
            return { zone: DEFAULT_TIME_ZONE, resolved: false };
        }
        throw err;
    }
};
