import { injectable } from 'inversify';
import { IRiskGate } from '../../../domain/interfaces/IRiskGate';
import { Ledger } from '../../../domain/entities/Ledger';
import { RiskLimits } from '../../../domain/value-objects/RiskLimits';
import { RiskDecision, MarketCheck } from '../../../domain/value-objects/RiskDecision';
import { InvariantViolationError } from '../../../domain/errors/AppErrors';

/**
 * Hard eligibility gates. Every check runs; the decision carries all failing reasons.
 * Expects a ledger that was rolled over for the current day.
 */
@injectable()
export class RiskGate implements IRiskGate {
    evaluate(ledger: Ledger, limits: RiskLimits, proposedStake: number, marketCheck?: MarketCheck): RiskDecision {
        if (!Number.isFinite(proposedStake) || proposedStake < 0) {
            throw new InvariantViolationError('Proposed stake must be a non-negative number', { proposedStake });
        }

        const reasons = [
            ...checkHardStops(ledger, limits),
            ...checkStakeLimits(ledger, limits, proposedStake)
        ];

        if (marketCheck && !marketCheck.allowed) {
            reasons.push(marketCheck.reason ?? 'market conditions unfavourable');
        }

        return { allowed: reasons.length === 0, reasons };
    }
}

/**
 * Checks that hold independent of any stake: daily loss, consecutive losses,
 * balance floor and drawdown, plus the daily trade count.
 */
export function checkHardStops(ledger: Ledger, limits: RiskLimits, includeTradeCount = true): string[] {
    const reasons: string[] = [];

    const dailyLoss = ledger.getDailyLoss();
    if (dailyLoss >= limits.maxDailyLoss) {
        reasons.push(`daily loss limit reached (${dailyLoss.toFixed(2)}/${limits.maxDailyLoss.toFixed(2)})`);
    }

    const dailyTrades = ledger.getDailyTrades();
    if (includeTradeCount && dailyTrades >= limits.maxDailyTrades) {
        reasons.push(`daily trade limit reached (${dailyTrades}/${limits.maxDailyTrades})`);
    }

    const consecutiveLosses = ledger.getConsecutiveLosses();
    if (consecutiveLosses >= limits.maxConsecutiveLosses) {
        reasons.push(`consecutive losses limit reached (${consecutiveLosses}/${limits.maxConsecutiveLosses})`);
    }

    const balance = ledger.getBalance();
    if (balance <= limits.minBalance) {
        reasons.push(`balance at or below minimum (${balance.toFixed(2)} <= ${limits.minBalance.toFixed(2)})`);
    }

    if (ledger.getPeakBalance() > 0) {
        const drawdown = ledger.getDrawdownPercent();
        if (drawdown >= limits.maxDrawdownPercent) {
            reasons.push(`max drawdown reached (${drawdown.toFixed(1)}% >= ${limits.maxDrawdownPercent}%)`);
        }
    }

    return reasons;
}

function checkStakeLimits(ledger: Ledger, limits: RiskLimits, stake: number): string[] {
    const reasons: string[] = [];

    if (stake < limits.minStake) {
        reasons.push(`stake below minimum (${stake.toFixed(2)} < ${limits.minStake.toFixed(2)})`);
    }
    if (stake > limits.maxStake) {
        reasons.push(`stake above maximum (${stake.toFixed(2)} > ${limits.maxStake.toFixed(2)})`);
    }

    const balance = ledger.getBalance();
    const stakePercent = balance > 0 ? (stake / balance) * 100 : Infinity;
    if (stakePercent > limits.maxStakePercent) {
        reasons.push(`stake exceeds ${limits.maxStakePercent}% of balance`);
    }

    return reasons;
}
