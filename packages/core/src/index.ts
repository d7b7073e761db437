/**
 * freetime core
 *
 * Shared time primitives for freetime packages.
 * All intervals are half-open: [start, end)
 */

/**
 * A point in time.
 * All instants are compared by their UTC millisecond value.
 */
export type Instant = Date;

/**
 * A half-open interval [start, end).
 * All times are UTC internally.
 */
export interface Interval {
	start: Instant;
	end: Instant;
}

/**
 * Anything that exposes a start and an end instant.
 * Blocks, spans, slots and caller records all satisfy it.
 */
export interface Period {
	readonly start: Instant;
	readonly end: Instant;
}

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;

// ============================================================================
// Errors
// ============================================================================

export type PeriodErrorCode = 'INVALID_RANGE';

/**
 * Base class for every error raised while building periods.
 */
export class PeriodError extends Error {
	readonly code: PeriodErrorCode;

	constructor(code: PeriodErrorCode, message: string) {
		super(message);
		this.name = 'PeriodError';
		this.code = code;
	}
}

/**
 * Raised when a period is requested with start >= end.
 */
export class InvalidRangeError extends PeriodError {
	readonly start: Instant;
	readonly end: Instant;

	constructor(start: Instant, end: Instant) {
		super('INVALID_RANGE', 'Start time must be before end time.');
		this.name = 'InvalidRangeError';
		this.start = new Date(start.getTime());
		this.end = new Date(end.getTime());
	}
}

export function isPeriodError(value: unknown): value is PeriodError {
	return value instanceof PeriodError;
}

// ============================================================================
// Result
// ============================================================================

export type Result<T, E = PeriodError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}
