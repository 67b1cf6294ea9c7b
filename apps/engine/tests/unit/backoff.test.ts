import { calculateBackOff } from '../../src/utils/backoff';

describe('calculateBackOff', () => {
    it('returns ~1000ms for attempt 1 (default)', () => {
        const delay = calculateBackOff(1);
        expect(delay).toBeGreaterThanOrEqual(900);
        expect(delay).toBeLessThanOrEqual(1100);
    });

    it('grows by the default base of 4', () => {
        const mid = () => 0.5;
        expect(calculateBackOff(1, {}, mid)).toBe(1000);
        expect(calculateBackOff(2, {}, mid)).toBe(4000);
        expect(calculateBackOff(3, {}, mid)).toBe(16000);
    });

    it('caps at maxIntervalMs', () => {
        expect(calculateBackOff(10, { maxIntervalMs: 5000 }, () => 0.5)).toBe(5000);
    });

    it('applies jitter in both directions', () => {
        expect(calculateBackOff(1, {}, () => 0)).toBe(900);
        expect(calculateBackOff(1, {}, () => 1)).toBe(1100);
        expect(calculateBackOff(1, { jitter: 0 }, () => 1)).toBe(1000);
    });
});
