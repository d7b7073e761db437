/**
 * Human readable descriptions of periods.
 */

import type { Period } from '@freetime/core';
import { differenceInMinutes } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import type { DescribeOptions } from './types.js';

const DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Describes a period as its start, end and duration.
 *
 * @example
 * ```typescript
 * describePeriod(span, { timeZone: 'Asia/Tokyo' });
 * // "start: 2024-01-15 09:00:00, end: 2024-01-15 17:00:00, duration: 8h 0m"
 * ```
 */
export function describePeriod(period: Period, options: DescribeOptions = {}): string {
	const timeZone = options.timeZone ?? 'UTC';
	const totalMinutes = differenceInMinutes(period.end, period.start);
	const hours = Math.floor(totalMinutes / 60);
	const minutes = totalMinutes % 60;

	const start = formatInTimeZone(period.start, timeZone, DATETIME_FORMAT);
	const end = formatInTimeZone(period.end, timeZone, DATETIME_FORMAT);

	return `start: ${start}, end: ${end}, duration: ${hours}h ${minutes}m`;
}

/**
 * Describes each period on its own line.
 */
export function describePeriods(periods: readonly Period[], options: DescribeOptions = {}): string {
	return periods.map((period) => describePeriod(period, options)).join('\n ');
}
