/**
 * Slot finder with its output conversion and options bound once.
 */

import { searchSlots } from './find.js';
import { describePeriods } from './format.js';
import { totalDuration } from './intervals.js';
import type { Span } from './periods.js';
import type { CreateSlotFinderOptions, Input, Period, SlotFinder } from './types.js';

/**
 * Create a slot finder that turns every free slot into the caller's record type.
 *
 * @example
 * ```typescript
 * const finder = createSlotFinder({ output: AvailableSlot, timeZone: 'Asia/Tokyo' });
 * const slots = finder.find(span, events);
 * console.log(finder.describe(slots));
 * ```
 */
export function createSlotFinder<T>(options: CreateSlotFinderOptions<T>): SlotFinder<T> {
	const { output, logger, timeZone } = options;

	function find(span: Span, inputs: readonly Input[]): T[] {
		return searchSlots(span, inputs, output, (slots) => {
			logger?.debug('found free slots', {
				span: span.toJSON(),
				inputs: inputs.length,
				slots: slots.length,
				freeMs: totalDuration(slots),
			});
		});
	}

	function describe(periods: readonly Period[]): string {
		return describePeriods(periods, { timeZone });
	}

	return {
		find,
		describe,
	};
}
