// src/utils/clock.ts

/**
 * Source of the current instant for every cutoff decision.
 * Tests replace `now` with `jest.spyOn(clock, 'now')` to simulate a clock.
 */
export const clock = {
    now: (): Date => new Date(),
};
