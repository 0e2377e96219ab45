import { TradeRecord } from '../../../domain/entities/TradeLifecycle';
import { TradeStats } from '../../../domain/interfaces/ITradeRepository';

/**
 * Aggregates settled trades in submission order.
 */
export function calculateTradeStats(records: TradeRecord[]): TradeStats {
    const results = records
        .filter(r => r.result !== null)
        .sort((a, b) => a.submittedAt - b.submittedAt)
        .map(r => r.result ?? 0);

    const total = results.length;
    const wins = results.filter(r => r > 0).length;
    const losses = total - wins;
    const totalPnl = results.reduce((sum, r) => sum + r, 0);

    const grossProfit = results.reduce((sum, r) => sum + (r > 0 ? r : 0), 0);
    const grossLoss = results.reduce((sum, r) => sum + (r < 0 ? Math.abs(r) : 0), 0);
    const profitFactor = grossLoss > 0 ? grossProfit / grossLoss : (grossProfit > 0 ? 999 : 0);

    let winStreak = 0;
    let lossStreak = 0;
    let maxConsecutiveWins = 0;
    let maxConsecutiveLosses = 0;
    for (const r of results) {
        if (r > 0) {
            winStreak++;
            lossStreak = 0;
            maxConsecutiveWins = Math.max(maxConsecutiveWins, winStreak);
        } else {
            lossStreak++;
            winStreak = 0;
            maxConsecutiveLosses = Math.max(maxConsecutiveLosses, lossStreak);
        }
    }

    return {
        total,
        wins,
        losses,
        winRate: total > 0 ? (wins / total) * 100 : 0,
        totalPnl,
        profitFactor,
        maxConsecutiveWins,
        maxConsecutiveLosses
    };
}
