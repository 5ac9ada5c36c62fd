/**
 * Time utilities — injectable clock and expiry arithmetic.
 *
 * Expiry computation reads Clock.now() instead of Date.now() so tests can
 * pin and advance time without touching globals.
 */

/** Injectable time source, epoch milliseconds. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}
}

/** Largest instant a JavaScript Date can hold (+275760-09-13T00:00:00Z). */
export const MAX_TIMESTAMP_MS = 8_640_000_000_000_000;

/** Instant `timeToLiveMs` after the clock's current reading, epoch milliseconds. */
export function expiryFrom(clock: Clock, timeToLiveMs: number): number {
	return clock.now() + timeToLiveMs;
}

/** Whole epoch seconds, rounded down. */
export function toEpochSeconds(ms: number): number {
	return Math.floor(ms / 1_000);
}
