import { LedgerSnapshot, DailySummary } from '../value-objects/LedgerSnapshot';
import { InvariantViolationError, ConfigurationError } from '../errors/AppErrors';
import { toSessionDate } from '../../shared/utils/time';

/**
 * Balance, peak and daily risk counters.
 *
 * Only two mutation paths exist: `rolloverIfNewDay` and `applyResult`.
 * Streak counters live with the daily counters and reset at the day boundary.
 */
export class Ledger {
    private balance: number;
    private peakBalance: number;
    private sessionDate: string;

    private dailyTrades = 0;
    private dailyWins = 0;
    private dailyLosses = 0;
    private dailyProfit = 0;
    private dailyLoss = 0;
    private consecutiveWins = 0;
    private consecutiveLosses = 0;

    constructor(initialBalance: number, now: Date) {
        if (!Number.isFinite(initialBalance) || initialBalance <= 0) {
            throw new ConfigurationError(`Initial balance must be a positive number, got ${initialBalance}`);
        }
        this.balance = initialBalance;
        this.peakBalance = initialBalance;
        this.sessionDate = toSessionDate(now);
    }

    static restore(snapshot: LedgerSnapshot): Ledger {
        const problems = validateSnapshot(snapshot);
        if (problems.length > 0) {
            throw new ConfigurationError(`Invalid ledger snapshot: ${problems.join('; ')}`);
        }

        const ledger = new Ledger(snapshot.peakBalance, new Date(`${snapshot.sessionDate}T00:00:00.000Z`));
        ledger.balance = snapshot.balance;
        ledger.sessionDate = snapshot.sessionDate;
        ledger.dailyTrades = snapshot.dailyTrades;
        ledger.dailyWins = snapshot.dailyWins;
        ledger.dailyLosses = snapshot.dailyLosses;
        ledger.dailyProfit = snapshot.dailyProfit;
        ledger.dailyLoss = snapshot.dailyLoss;
        ledger.consecutiveWins = snapshot.consecutiveWins;
        ledger.consecutiveLosses = snapshot.consecutiveLosses;
        return ledger;
    }

    getBalance(): number {
        return this.balance;
    }

    getPeakBalance(): number {
        return this.peakBalance;
    }

    getSessionDate(): string {
        return this.sessionDate;
    }

    getDailyTrades(): number {
        return this.dailyTrades;
    }

    getDailyWins(): number {
        return this.dailyWins;
    }

    getDailyLosses(): number {
        return this.dailyLosses;
    }

    getDailyProfit(): number {
        return this.dailyProfit;
    }

    getDailyLoss(): number {
        return this.dailyLoss;
    }

    getConsecutiveWins(): number {
        return this.consecutiveWins;
    }

    getConsecutiveLosses(): number {
        return this.consecutiveLosses;
    }

    /** Share of today's settled trades that won; 0 when there are none. */
    getWinRate(): number {
        const total = this.dailyWins + this.dailyLosses;
        return total > 0 ? this.dailyWins / total : 0;
    }

    hasSettledTradesToday(): boolean {
        return this.dailyWins + this.dailyLosses > 0;
    }

    getDrawdownPercent(): number {
        if (this.peakBalance <= 0) return 0;
        return ((this.peakBalance - this.balance) / this.peakBalance) * 100;
    }

    /**
     * Resets daily counters when `now` falls on a later UTC day than the session.
     * Returns true when a reset happened.
     */
    rolloverIfNewDay(now: Date): boolean {
        const today = toSessionDate(now);
        if (today === this.sessionDate) return false;

        this.sessionDate = today;
        this.dailyTrades = 0;
        this.dailyWins = 0;
        this.dailyLosses = 0;
        this.dailyProfit = 0;
        this.dailyLoss = 0;
        this.consecutiveWins = 0;
        this.consecutiveLosses = 0;
        return true;
    }

    applyResult(stake: number, signedResult: number): void {
        if (!Number.isFinite(stake) || stake < 0) {
            throw new InvariantViolationError('Settled stake must be a non-negative number', { stake, signedResult });
        }
        if (!Number.isFinite(signedResult)) {
            throw new InvariantViolationError('Settlement result must be finite', { stake, signedResult });
        }

        this.balance += signedResult;
        if (this.balance > this.peakBalance) {
            this.peakBalance = this.balance;
        }

        this.dailyTrades++;

        if (signedResult > 0) {
            this.dailyWins++;
            this.dailyProfit += signedResult;
            this.consecutiveWins++;
            this.consecutiveLosses = 0;
        } else {
            this.dailyLosses++;
            this.dailyLoss += Math.abs(signedResult);
            this.consecutiveLosses++;
            this.consecutiveWins = 0;
        }
    }

    snapshot(): LedgerSnapshot {
        return {
            balance: this.balance,
            peakBalance: this.peakBalance,
            sessionDate: this.sessionDate,
            dailyTrades: this.dailyTrades,
            dailyWins: this.dailyWins,
            dailyLosses: this.dailyLosses,
            dailyProfit: this.dailyProfit,
            dailyLoss: this.dailyLoss,
            consecutiveWins: this.consecutiveWins,
            consecutiveLosses: this.consecutiveLosses
        };
    }

    dailySummary(): DailySummary {
        return {
            date: this.sessionDate,
            totalTrades: this.dailyTrades,
            wins: this.dailyWins,
            losses: this.dailyLosses,
            winRate: this.getWinRate(),
            profit: this.dailyProfit,
            loss: this.dailyLoss,
            netResult: this.dailyProfit - this.dailyLoss,
            balance: this.balance,
            consecutiveWins: this.consecutiveWins,
            consecutiveLosses: this.consecutiveLosses
        };
    }
}

const COUNTER_FIELDS = [
    'dailyTrades',
    'dailyWins',
    'dailyLosses',
    'consecutiveWins',
    'consecutiveLosses'
] as const;

const AMOUNT_FIELDS = ['dailyProfit', 'dailyLoss'] as const;

function validateSnapshot(snapshot: LedgerSnapshot): string[] {
    const problems: string[] = [];

    if (!Number.isFinite(snapshot.balance)) problems.push('balance is not a number');
    if (!Number.isFinite(snapshot.peakBalance) || snapshot.peakBalance <= 0) {
        problems.push('peakBalance must be positive');
    } else if (snapshot.balance > snapshot.peakBalance) {
        problems.push('balance exceeds peakBalance');
    }
    if (typeof snapshot.sessionDate !== 'string' || !/^\d{4}-\d{2}-\d{2}$/.test(snapshot.sessionDate)) {
        problems.push('sessionDate must be YYYY-MM-DD');
    }
    for (const field of COUNTER_FIELDS) {
        const value = snapshot[field];
        if (!Number.isInteger(value) || value < 0) problems.push(`${field} must be a non-negative integer`);
    }
    for (const field of AMOUNT_FIELDS) {
        const value = snapshot[field];
        if (!Number.isFinite(value) || value < 0) problems.push(`${field} must be a non-negative number`);
    }
    if (snapshot.consecutiveWins > 0 && snapshot.consecutiveLosses > 0) {
        problems.push('consecutiveWins and consecutiveLosses are both nonzero');
    }
    if (snapshot.dailyWins + snapshot.dailyLosses !== snapshot.dailyTrades) {
        problems.push('dailyWins + dailyLosses must equal dailyTrades');
    }

    return problems;
}
