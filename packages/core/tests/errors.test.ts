import { describe, expect, test } from 'vitest';
import { err, InvalidRangeError, isPeriodError, ok, PeriodError } from '../src/index.js';
import type { Result } from '../src/index.js';

const d = (iso: string) => new Date(iso);

describe('InvalidRangeError', () => {
	test('carries code, message and endpoints', () => {
		const error = new InvalidRangeError(d('2024-01-01T12:00:00Z'), d('2024-01-01T09:00:00Z'));

		expect(error).toBeInstanceOf(PeriodError);
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe('InvalidRangeError');
		expect(error.code).toBe('INVALID_RANGE');
		expect(error.message).toBe('Start time must be before end time.');
		expect(error.start.toISOString()).toBe('2024-01-01T12:00:00.000Z');
		expect(error.end.toISOString()).toBe('2024-01-01T09:00:00.000Z');
	});

	test('keeps its own copy of the endpoints', () => {
		const start = d('2024-01-01T12:00:00Z');
		const error = new InvalidRangeError(start, start);
		start.setUTCHours(0);

		expect(error.start.toISOString()).toBe('2024-01-01T12:00:00.000Z');
	});
});

describe('isPeriodError', () => {
	test('recognizes period errors only', () => {
		const start = d('2024-01-01T00:00:00Z');
		expect(isPeriodError(new InvalidRangeError(start, start))).toBe(true);
		expect(isPeriodError(new Error('other'))).toBe(false);
		expect(isPeriodError({ code: 'INVALID_RANGE' })).toBe(false);
		expect(isPeriodError(undefined)).toBe(false);
	});
});

describe('Result helpers', () => {
	test('ok wraps a value', () => {
		const result: Result<number> = ok(42);
		expect(result).toEqual({ ok: true, value: 42 });
	});

	test('err wraps an error', () => {
		const start = d('2024-01-01T00:00:00Z');
		const error = new InvalidRangeError(start, start);
		const result: Result<number> = err(error);

		expect(result.ok).toBe(false);
		if (result.ok) throw new Error('expected err');
		expect(result.error).toBe(error);
	});
});
