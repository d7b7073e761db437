/**
 * Finds the free time left in a span once busy blocks are taken out.
 */

import { normalizeBlocks } from './intervals.js';
import { Slot } from './periods.js';
import type { Block, Span } from './periods.js';
import type { Input, Output } from './types.js';

/**
 * Walks the merged blocks with a cursor starting at the span start and
 * emits every gap in front of it.
 *
 * Blocks outside the span contribute nothing; blocks crossing a span
 * boundary only count for the part inside it.
 *
 * @returns Chronological, disjoint, non-adjacent slots inside the span
 */
export function findFreeSlots(span: Span, blocks: readonly Block[]): Slot[] {
	const spanEnd = span.end.getTime();
	let cursor = span.start.getTime();
	const slots: Slot[] = [];

	for (const block of normalizeBlocks(blocks)) {
		const blockStart = block.start.getTime();
		const blockEnd = block.end.getTime();

		if (blockEnd <= cursor) {
			continue;
		}
		// Merged blocks are sorted, nothing later can reach into the span
		if (blockStart >= spanEnd) {
			break;
		}

		if (blockStart > cursor) {
			slots.push(Slot.create(new Date(cursor), new Date(blockStart)));
		}
		cursor = Math.max(cursor, blockEnd);

		if (cursor >= spanEnd) {
			break;
		}
	}

	if (cursor < spanEnd) {
		slots.push(Slot.create(new Date(cursor), new Date(spanEnd)));
	}

	return slots;
}

/**
 * Finds the available slots in a span, excluding the scheduled inputs.
 *
 * Each input is converted with `toBlock()` and each free slot with
 * `output.createFromSlot()`, exactly once. Inputs must all come from the
 * same schedule; mixing unrelated schedules gives meaningless gaps.
 *
 * @throws InvalidRangeError when an input cannot be converted to a block
 *
 * @example
 * ```typescript
 * const span = Span.create(new Date('2024-01-15T09:00:00Z'), new Date('2024-01-15T17:00:00Z'));
 * const free = findSlots(span, events, AvailableSlot);
 * ```
 */
export function findSlots<T>(span: Span, inputs: readonly Input[], output: Output<T>): T[] {
	return searchSlots(span, inputs, output);
}

/**
 * The conversion pipeline behind `findSlots` and the bound finder.
 * `onFound` sees the free slots before they are converted.
 */
export function searchSlots<T>(
	span: Span,
	inputs: readonly Input[],
	output: Output<T>,
	onFound?: (slots: readonly Slot[]) => void,
): T[] {
	const blocks = inputs.map((input) => input.toBlock());
	const slots = findFreeSlots(span, blocks);
	onFound?.(slots);
	return slots.map((slot) => output.createFromSlot(slot));
}
