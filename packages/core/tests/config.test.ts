import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('resolveConfig', () => {
    it('fills defaults', () => {
        expect(resolveConfig()).toEqual({ min_confidence: 0.1, date_window_days: 3, amount_tolerance: 0.05 });
    });

    it('keeps valid overrides', () => {
        expect(resolveConfig({ min_confidence: 0.5, date_window_days: 0 })).toEqual({
            min_confidence: 0.5,
            date_window_days: 0,
            amount_tolerance: 0.05,
        });
    });

    it('rejects a min_confidence outside [0, 1]', () => {
        expect(() => resolveConfig({ min_confidence: 1.5 })).toThrow(ConfigurationError);
        expect(() => resolveConfig({ min_confidence: -0.1 })).toThrow(
            'Invalid configuration: min_confidence must be between 0 and 1'
        );
    });

    it('lists every problem', () => {
        try {
            resolveConfig({ min_confidence: 2, date_window_days: -1, amount_tolerance: 0 });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigurationError);
            if (err instanceof ConfigurationError) {
                expect(err.problems).toEqual([
                    'min_confidence must be between 0 and 1',
                    'date_window_days must not be negative',
                    'amount_tolerance must be greater than 0',
                ]);
                expect(err.code).toBe('configuration');
                expect(err.name).toBe('ConfigurationError');
            }
        }
    });

    it('rejects a fractional date window', () => {
        expect(() => resolveConfig({ date_window_days: 1.5 })).toThrow(
            'Invalid configuration: date_window_days must be a whole number of days'
        );
    });
});
