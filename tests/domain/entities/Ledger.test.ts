import { Ledger } from '../../../src/domain/entities/Ledger';
import { ConfigurationError, InvariantViolationError } from '../../../src/domain/errors/AppErrors';

const DAY_ONE = new Date('2026-03-02T10:00:00Z');
const DAY_TWO = new Date('2026-03-03T00:00:01Z');

describe('Ledger', () => {
    it('starts at the initial balance with zeroed counters', () => {
        const ledger = new Ledger(1000, DAY_ONE);

        expect(ledger.snapshot()).toEqual({
            balance: 1000,
            peakBalance: 1000,
            sessionDate: '2026-03-02',
            dailyTrades: 0,
            dailyWins: 0,
            dailyLosses: 0,
            dailyProfit: 0,
            dailyLoss: 0,
            consecutiveWins: 0,
            consecutiveLosses: 0
        });
    });

    it('rejects a non-positive initial balance', () => {
        expect(() => new Ledger(0, DAY_ONE)).toThrow(ConfigurationError);
        expect(() => new Ledger(-5, DAY_ONE)).toThrow(ConfigurationError);
    });

    it('keeps balance equal to initial balance plus the sum of results', () => {
        const ledger = new Ledger(1000, DAY_ONE);
        const results = [16, -20, -20, 12.5, -8, 40];

        for (const r of results) {
            ledger.applyResult(20, r);
        }

        expect(ledger.getBalance()).toBeCloseTo(1000 + 20.5, 10);
        expect(ledger.getDailyTrades()).toBe(6);
        expect(ledger.getDailyWins()).toBe(3);
        expect(ledger.getDailyLosses()).toBe(3);
        expect(ledger.getDailyProfit()).toBeCloseTo(68.5, 10);
        expect(ledger.getDailyLoss()).toBe(48);
    });

    it('tracks the peak as the running maximum balance', () => {
        const ledger = new Ledger(1000, DAY_ONE);

        ledger.applyResult(10, 50);
        ledger.applyResult(10, -30);
        ledger.applyResult(10, 10);

        expect(ledger.getPeakBalance()).toBe(1050);
        expect(ledger.getBalance()).toBe(1030);
        expect(ledger.getDrawdownPercent()).toBeCloseTo((20 / 1050) * 100, 10);
    });

    it('never has both streaks nonzero', () => {
        const ledger = new Ledger(1000, DAY_ONE);

        ledger.applyResult(10, -10);
        ledger.applyResult(10, -10);
        expect(ledger.getConsecutiveLosses()).toBe(2);
        expect(ledger.getConsecutiveWins()).toBe(0);

        ledger.applyResult(10, 8);
        expect(ledger.getConsecutiveLosses()).toBe(0);
        expect(ledger.getConsecutiveWins()).toBe(1);
    });

    it('counts a zero result as a loss', () => {
        const ledger = new Ledger(1000, DAY_ONE);

        ledger.applyResult(10, 0);

        expect(ledger.getDailyLosses()).toBe(1);
        expect(ledger.getConsecutiveLosses()).toBe(1);
        expect(ledger.getDailyLoss()).toBe(0);
    });

    it('refuses a non-finite result or a negative stake without changing state', () => {
        const ledger = new Ledger(1000, DAY_ONE);

        expect(() => ledger.applyResult(10, Number.NaN)).toThrow(InvariantViolationError);
        expect(() => ledger.applyResult(-1, 5)).toThrow(InvariantViolationError);
        expect(ledger.getBalance()).toBe(1000);
        expect(ledger.getDailyTrades()).toBe(0);
    });

    describe('rolloverIfNewDay', () => {
        it('resets daily counters and streaks on a new UTC day but keeps balance and peak', () => {
            const ledger = new Ledger(1000, DAY_ONE);
            ledger.applyResult(20, 16);
            ledger.applyResult(20, -20);
            ledger.applyResult(20, -20);

            expect(ledger.rolloverIfNewDay(DAY_TWO)).toBe(true);

            expect(ledger.snapshot()).toEqual({
                balance: 976,
                peakBalance: 1016,
                sessionDate: '2026-03-03',
                dailyTrades: 0,
                dailyWins: 0,
                dailyLosses: 0,
                dailyProfit: 0,
                dailyLoss: 0,
                consecutiveWins: 0,
                consecutiveLosses: 0
            });
        });

        it('is idempotent within the same day', () => {
            const ledger = new Ledger(1000, DAY_ONE);
            ledger.applyResult(20, -20);

            expect(ledger.rolloverIfNewDay(new Date('2026-03-02T23:59:59Z'))).toBe(false);
            expect(ledger.getDailyLoss()).toBe(20);

            expect(ledger.rolloverIfNewDay(DAY_TWO)).toBe(true);
            expect(ledger.rolloverIfNewDay(DAY_TWO)).toBe(false);
        });
    });

    describe('restore', () => {
        it('round-trips a snapshot', () => {
            const ledger = new Ledger(1000, DAY_ONE);
            ledger.applyResult(20, -20);
            ledger.applyResult(20, -20);

            const restored = Ledger.restore(ledger.snapshot());

            expect(restored.snapshot()).toEqual(ledger.snapshot());
        });

        it('rejects a snapshot with inconsistent counters', () => {
            const snapshot = {
                ...new Ledger(1000, DAY_ONE).snapshot(),
                dailyTrades: 2,
                dailyWins: 1,
                dailyLosses: 0
            };

            expect(() => Ledger.restore(snapshot)).toThrow(
                'Invalid ledger snapshot: dailyWins + dailyLosses must equal dailyTrades'
            );
        });

        it('rejects a balance above the peak', () => {
            const snapshot = { ...new Ledger(1000, DAY_ONE).snapshot(), balance: 1200 };

            expect(() => Ledger.restore(snapshot)).toThrow('Invalid ledger snapshot: balance exceeds peakBalance');
        });
    });

    it('summarises the day', () => {
        const ledger = new Ledger(1000, DAY_ONE);
        ledger.applyResult(20, 16);
        ledger.applyResult(20, -20);

        expect(ledger.dailySummary()).toEqual({
            date: '2026-03-02',
            totalTrades: 2,
            wins: 1,
            losses: 1,
            winRate: 0.5,
            profit: 16,
            loss: 20,
            netResult: -4,
            balance: 996,
            consecutiveWins: 0,
            consecutiveLosses: 1
        });
    });
});
