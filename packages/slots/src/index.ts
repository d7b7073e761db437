/**
 * freetime slots
 *
 * A stateless slot finding library for Node.js.
 * Given a span and the events already scheduled in it, it answers the question:
 * "When is this schedule free?"
 *
 * @packageDocumentation
 */

// Period values
export { Block, Slot, Span } from './periods.js';
export type { PeriodValue } from './periods.js';
// Normalizer
export { mergeIntervals, normalizeBlocks, totalDuration } from './intervals.js';
// Main query functions
export { findFreeSlots, findSlots } from './find.js';
// Formatting
export { describePeriod, describePeriods } from './format.js';
// Bound finder
export { createSlotFinder } from './engine.js';

// Errors and results
export { InvalidRangeError, isPeriodError, PeriodError } from '@freetime/core';
export type { PeriodErrorCode, Result } from '@freetime/core';

// All types
export type {
	CreateSlotFinderOptions,
	DescribeOptions,
	DurationMs,
	Input,
	Instant,
	Interval,
	Output,
	Period,
	SlotFinder,
	SlotLogger,
} from './types.js';
