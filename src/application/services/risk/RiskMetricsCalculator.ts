import { Ledger } from '../../../domain/entities/Ledger';
import { RiskLimits } from '../../../domain/value-objects/RiskLimits';
import { RiskMetrics } from '../../../domain/value-objects/RiskMetrics';
import { RiskLevel } from '../../../domain/enums/RiskLevel';
import { checkHardStops } from './RiskGate';

/**
 * Derives RiskMetrics from the ledger. Keeps only the highest drawdown seen,
 * which is not part of the ledger's persisted state.
 */
export class RiskMetricsCalculator {
    private maxDrawdownSeen = 0;

    calculate(ledger: Ledger, limits: RiskLimits): RiskMetrics {
        const currentDrawdownPercent = ledger.getDrawdownPercent();
        this.maxDrawdownSeen = Math.max(this.maxDrawdownSeen, currentDrawdownPercent);

        return {
            balance: ledger.getBalance(),
            peakBalance: ledger.getPeakBalance(),
            dailyLoss: ledger.getDailyLoss(),
            dailyProfit: ledger.getDailyProfit(),
            dailyTrades: ledger.getDailyTrades(),
            consecutiveLosses: ledger.getConsecutiveLosses(),
            consecutiveWins: ledger.getConsecutiveWins(),
            currentDrawdownPercent,
            maxDrawdownPercent: this.maxDrawdownSeen,
            winRate: ledger.getWinRate(),
            riskLevel: classifyRiskLevel(ledger, limits)
        };
    }

    /**
     * Reasons the loop must stop: a CRITICAL level, or any stake-independent hard stop.
     * The daily trade count is a per-day pause, not a halt.
     */
    haltReasons(ledger: Ledger, limits: RiskLimits): string[] {
        const reasons: string[] = [];
        if (classifyRiskLevel(ledger, limits) === RiskLevel.CRITICAL) {
            reasons.push('risk level CRITICAL');
        }
        return [...reasons, ...checkHardStops(ledger, limits, false)];
    }
}

export function classifyRiskLevel(ledger: Ledger, limits: RiskLimits): RiskLevel {
    if (ledger.getBalance() <= limits.minBalance) return RiskLevel.CRITICAL;

    const drawdown = ledger.getDrawdownPercent();
    const losses = ledger.getConsecutiveLosses();

    if (drawdown > 15 || losses > 3) return RiskLevel.HIGH;
    if (drawdown > 10 || losses > 2) return RiskLevel.MEDIUM;
    return RiskLevel.LOW;
}
