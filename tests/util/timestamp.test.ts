import { describe, expect, test } from 'vitest';
import { formatTimestamp } from '../../src/util/timestamp';

describe('formatTimestamp', () => {
    test('formats zero', () => {
        expect(formatTimestamp(0)).toBe('00:00:00.000');
    });

    test('formats fractional seconds', () => {
        expect(formatTimestamp(3.5)).toBe('00:00:03.500');
        expect(formatTimestamp(61.25)).toBe('00:01:01.250');
    });

    test('formats hours', () => {
        expect(formatTimestamp(3723.004)).toBe('01:02:03.004');
    });

    test('rounds to the nearest millisecond', () => {
        expect(formatTimestamp(59.9996)).toBe('00:01:00.000');
    });

    test('rejects negative and non-finite values', () => {
        expect(() => formatTimestamp(-1)).toThrow(RangeError);
        expect(() => formatTimestamp(Number.NaN)).toThrow(RangeError);
    });
});
