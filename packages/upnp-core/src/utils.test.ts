import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import { convertVolume, delay, formatTimedelta, isConnectionError, parseTimedelta } from './utils';

describe('parseTimedelta', () => {
    it('should parse H:MM:SS with a fraction', () => {
        expect(parseTimedelta('12:34:56.789')).toBe(45296789);
    });

    it('should parse H:MM:SS without a fraction', () => {
        expect(parseTimedelta('12:34:56')).toBe(45296000);
        expect(parseTimedelta('0:03:25')).toBe(205000);
    });

    it('should return null for values that are not durations', () => {
        expect(parseTimedelta('NOT_IMPLEMENTED')).toBeNull();
        expect(parseTimedelta('')).toBeNull();
    });
});

describe('formatTimedelta', () => {
    it('should format milliseconds as H:MM:SS', () => {
        expect(formatTimedelta(62500)).toBe('0:01:02');
        expect(formatTimedelta(45296000)).toBe('12:34:56');
    });
});

describe('convertVolume', () => {
    it('should return the value unchanged when the ranges are equal', () => {
        expect(convertVolume(50, 100, 0, 100, 0, 1)).toBe(50);
    });

    it('should shift the value when the ranges have the same width', () => {
        expect(convertVolume(30, 100, 0, 110, 10, 1)).toBe(40);
    });

    it('should scale and round down to the target step', () => {
        expect(convertVolume(50, 100, 0, 50, 0, 1)).toBe(25);
        expect(convertVolume(33, 100, 0, 60, 0, 5)).toBe(3);
    });
});

describe('isConnectionError', () => {
    it('should treat an axios error without a response as a connection error', () => {
        expect(isConnectionError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'))).toBe(true);
    });

    it('should not treat plain errors as connection errors', () => {
        expect(isConnectionError(new Error('boom'))).toBe(false);
    });
});

describe('delay', () => {
    it('should resolve early when the signal is aborted', async () => {
        const controller = new AbortController();
        const started = Date.now();
        const pending = delay(60_000, controller.signal);
        controller.abort();
        await pending;
        expect(Date.now() - started).toBeLessThan(1000);
    });
});
