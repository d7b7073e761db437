/**
 * Validated period values: Block, Span and Slot.
 *
 * All three are half-open [start, end) with start < end, immutable once built,
 * and only constructible through their factories.
 */

import { err, InvalidRangeError, ok } from '@freetime/core';
import type { DurationMs, Instant, Period, Result } from '@freetime/core';
import { describePeriod } from './format.js';

function isValidRange(start: Instant, end: Instant): boolean {
	// NaN times (invalid dates) fail this comparison too
	return start.getTime() < end.getTime();
}

function assertValidRange(start: Instant, end: Instant): void {
	if (!isValidRange(start, end)) {
		throw new InvalidRangeError(start, end);
	}
}

/**
 * Shared value semantics for the period classes.
 * Endpoints are stored as epoch milliseconds and handed out as fresh Dates.
 */
export abstract class PeriodValue implements Period {
	protected readonly startMs: number;
	protected readonly endMs: number;

	protected constructor(start: Instant, end: Instant) {
		this.startMs = start.getTime();
		this.endMs = end.getTime();
	}

	/** The start of the period (inclusive) */
	get start(): Date {
		return new Date(this.startMs);
	}

	/** The end of the period (exclusive) */
	get end(): Date {
		return new Date(this.endMs);
	}

	get durationMs(): DurationMs {
		return this.endMs - this.startMs;
	}

	/**
	 * Whether the instant falls inside the period.
	 * The end is exclusive.
	 */
	contains(instant: Instant): boolean {
		const time = instant.getTime();
		return time >= this.startMs && time < this.endMs;
	}

	/**
	 * Whether the two periods share some time.
	 * Periods that only touch at an endpoint do not overlap.
	 */
	overlaps(other: Period): boolean {
		return other.start.getTime() < this.endMs && this.startMs < other.end.getTime();
	}

	/** Whether the other period lies entirely within this one. */
	covers(other: Period): boolean {
		return this.startMs <= other.start.getTime() && other.end.getTime() <= this.endMs;
	}

	/** Whether this period lies entirely within the other one. */
	isWithin(other: Period): boolean {
		return other.start.getTime() <= this.startMs && this.endMs <= other.end.getTime();
	}

	equals(other: Period): boolean {
		return this.startMs === other.start.getTime() && this.endMs === other.end.getTime();
	}

	toJSON(): { start: string; end: string } {
		return {
			start: this.start.toISOString(),
			end: this.end.toISOString(),
		};
	}

	toString(): string {
		return describePeriod(this);
	}
}

/**
 * An already scheduled event: time that is not available.
 *
 * @example
 * ```typescript
 * const lunch = Block.create(
 *   new Date('2024-01-15T12:00:00Z'),
 *   new Date('2024-01-15T13:00:00Z'),
 * );
 * ```
 */
export class Block extends PeriodValue {
	readonly kind = 'block' as const;

	private constructor(start: Instant, end: Instant) {
		super(start, end);
	}

	/**
	 * Creates a block, throwing InvalidRangeError unless start < end.
	 */
	static create(start: Instant, end: Instant): Block {
		assertValidRange(start, end);
		return new Block(start, end);
	}

	/**
	 * Creates a block, returning the InvalidRangeError instead of throwing it.
	 */
	static parse(start: Instant, end: Instant): Result<Block, InvalidRangeError> {
		if (!isValidRange(start, end)) {
			return err(new InvalidRangeError(start, end));
		}
		return ok(new Block(start, end));
	}

	/**
	 * Converts any period into a block.
	 * This is the usual body of a caller record's `toBlock()`.
	 */
	static from(period: Period): Block {
		return Block.create(period.start, period.end);
	}
}

/**
 * The search window. Every slot found lies inside it.
 */
export class Span extends PeriodValue {
	readonly kind = 'span' as const;

	private constructor(start: Instant, end: Instant) {
		super(start, end);
	}

	static create(start: Instant, end: Instant): Span {
		assertValidRange(start, end);
		return new Span(start, end);
	}

	static parse(start: Instant, end: Instant): Result<Span, InvalidRangeError> {
		if (!isValidRange(start, end)) {
			return err(new InvalidRangeError(start, end));
		}
		return ok(new Span(start, end));
	}

	static from(period: Period): Span {
		return Span.create(period.start, period.end);
	}
}

/**
 * A free period found inside a span.
 *
 * A slot is not a block; feed one back in as busy time through `toBlock()`.
 */
export class Slot extends PeriodValue {
	readonly kind = 'slot' as const;

	private constructor(start: Instant, end: Instant) {
		super(start, end);
	}

	static create(start: Instant, end: Instant): Slot {
		assertValidRange(start, end);
		return new Slot(start, end);
	}

	static parse(start: Instant, end: Instant): Result<Slot, InvalidRangeError> {
		if (!isValidRange(start, end)) {
			return err(new InvalidRangeError(start, end));
		}
		return ok(new Slot(start, end));
	}

	toBlock(): Block {
		return Block.create(this.start, this.end);
	}
}
