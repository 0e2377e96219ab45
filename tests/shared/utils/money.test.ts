import { roundToIncrement } from '../../../src/shared/utils/money';
import { computeBackoff } from '../../../src/shared/utils/backoff';
import { toSessionDate, withDeadline } from '../../../src/shared/utils/time';

describe('roundToIncrement', () => {
    it('rounds to the nearest increment', () => {
        expect(roundToIncrement(24.691, 0.01, 1, 100)).toBe(24.69);
        expect(roundToIncrement(0.1 * 3, 0.1, 0, 10)).toBe(0.3);
        expect(roundToIncrement(7.3, 0.5, 1, 100)).toBe(7.5);
    });

    it('stays inside the bounds when rounding would leave them', () => {
        expect(roundToIncrement(99.999, 0.01, 1, 99.99)).toBe(99.99);
        expect(roundToIncrement(0.7, 0.5, 0.9, 100)).toBe(1);
    });
});

describe('computeBackoff', () => {
    it('doubles per attempt up to the cap', () => {
        expect([0, 1, 2, 3, 4, 5].map(a => computeBackoff(a, 1000, 10_000))).toEqual([
            1000, 2000, 4000, 8000, 10_000, 10_000
        ]);
    });
});

describe('toSessionDate', () => {
    it('uses the UTC calendar day', () => {
        expect(toSessionDate(new Date('2026-03-02T23:59:59.999Z'))).toBe('2026-03-02');
        expect(toSessionDate(new Date('2026-03-03T00:00:00.000Z'))).toBe('2026-03-03');
    });
});

describe('withDeadline', () => {
    it('resolves when the promise wins', async () => {
        await expect(withDeadline(Promise.resolve(5), Date.now() + 1000, () => new Error('late'))).resolves.toBe(5);
    });

    it('rejects with the timeout error when the deadline passes first', async () => {
        const never = new Promise<number>(() => undefined);

        await expect(withDeadline(never, Date.now() + 10, () => new Error('late'))).rejects.toThrow('late');
    });
});
