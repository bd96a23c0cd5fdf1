// src/utils/clock.ts

/** Current time in unix ms. Injected so expiry can be tested without waiting. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
