/**
 * Normalizing busy time: merging intervals into a sorted, disjoint sequence.
 * All intervals are half-open [start, end), meaning start is inclusive and end is exclusive.
 * None of these functions mutate their input.
 */

import type { DurationMs, Interval, Period } from '@freetime/core';
import { Block } from './periods.js';

export type { Interval };

/**
 * Copies a period into a plain interval with new Date objects.
 */
function toInterval(period: Period): Interval {
	return {
		start: new Date(period.start.getTime()),
		end: new Date(period.end.getTime()),
	};
}

function compareIntervals(a: Interval, b: Interval): number {
	const startDiff = a.start.getTime() - b.start.getTime();
	if (startDiff !== 0) return startDiff;
	return a.end.getTime() - b.end.getTime();
}

/**
 * Merges overlapping or adjacent intervals into a sorted list of non-overlapping intervals.
 *
 * Intervals that share only an endpoint ([a, b) and [b, c)) are merged, so the
 * result never contains a zero-width gap. Intervals with start >= end are dropped.
 *
 * @param intervals - Intervals to merge (can be unsorted)
 * @returns A sorted array of disjoint, non-adjacent intervals covering the same time
 *
 * @example
 * ```typescript
 * const merged = mergeIntervals([
 *   { start: new Date('2024-01-01T10:00:00Z'), end: new Date('2024-01-01T12:00:00Z') },
 *   { start: new Date('2024-01-01T11:00:00Z'), end: new Date('2024-01-01T13:00:00Z') },
 * ]);
 * // Result: [{ start: 2024-01-01T10:00:00Z, end: 2024-01-01T13:00:00Z }]
 * ```
 */
export function mergeIntervals(intervals: readonly Period[]): Interval[] {
	const sorted = intervals
		.filter((interval) => interval.start.getTime() < interval.end.getTime())
		.map(toInterval)
		.sort(compareIntervals);

	const merged: Interval[] = [];

	for (const interval of sorted) {
		const current = merged[merged.length - 1];

		if (current === undefined || interval.start.getTime() > current.end.getTime()) {
			merged.push(interval);
			continue;
		}

		if (interval.end.getTime() > current.end.getTime()) {
			current.end = interval.end;
		}
	}

	return merged;
}

/**
 * Merges blocks the same way as `mergeIntervals`, keeping them as blocks.
 */
export function normalizeBlocks(blocks: readonly Block[]): Block[] {
	return mergeIntervals(blocks).map((interval) => Block.create(interval.start, interval.end));
}

/**
 * Total time covered by the intervals, counting overlaps once.
 */
export function totalDuration(intervals: readonly Period[]): DurationMs {
	return mergeIntervals(intervals).reduce(
		(sum, interval) => sum + (interval.end.getTime() - interval.start.getTime()),
		0,
	);
}
