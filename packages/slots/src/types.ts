/**
 * Slot finder type definitions.
 *
 * All intervals are half-open: [start, end)
 * All times are UTC internally; timezone handling is the consumer's
 * responsibility at the input/output boundary.
 */

import type { DurationMs, Instant, Interval, Period } from '@freetime/core';
import type { Block, Slot, Span } from './periods.js';

export type { DurationMs, Instant, Interval, Period };

/**
 * A caller record that can be read as busy time.
 *
 * @example
 * class ScheduledEvent implements Input {
 *   constructor(readonly start: Date, readonly end: Date) {}
 *
 *   toBlock(): Block {
 *     return Block.from(this);
 *   }
 * }
 */
export interface Input extends Period {
	toBlock(): Block;
}

/**
 * Builds a caller record from a free slot.
 * A class with a static `createFromSlot` satisfies this, so the class
 * itself can be passed wherever an Output is expected.
 *
 * @example
 * class AvailableSlot {
 *   constructor(readonly start: Date, readonly end: Date) {}
 *
 *   static createFromSlot(slot: Slot): AvailableSlot {
 *     return new AvailableSlot(slot.start, slot.end);
 *   }
 * }
 */
export interface Output<T> {
	createFromSlot(slot: Slot): T;
}

/**
 * Receives diagnostic entries from the slot finder.
 */
export interface SlotLogger {
	debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Options accepted by period formatting.
 */
export interface DescribeOptions {
	/** IANA timezone to render instants in. Defaults to UTC. */
	timeZone?: string;
}

/**
 * Configuration for a slot finder.
 */
export interface CreateSlotFinderOptions<T> {
	/** Converts each free slot into the caller's record type */
	output: Output<T>;
	/** Receives a debug entry per search */
	logger?: SlotLogger;
	/** Timezone used by `describe` */
	timeZone?: string;
}

/**
 * A slot finder with its output conversion and options bound.
 */
export interface SlotFinder<T> {
	find(span: Span, inputs: readonly Input[]): T[];
	describe(periods: readonly Period[]): string;
}
