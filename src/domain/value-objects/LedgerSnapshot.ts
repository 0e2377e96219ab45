/**
 * Verbatim persisted form of a Ledger. Every field is required.
 */
export interface LedgerSnapshot {
    balance: number;
    peakBalance: number;
    sessionDate: string;
    dailyTrades: number;
    dailyWins: number;
    dailyLosses: number;
    dailyProfit: number;
    dailyLoss: number;
    consecutiveWins: number;
    consecutiveLosses: number;
}

export interface DailySummary {
    date: string;
    totalTrades: number;
    wins: number;
    losses: number;
    winRate: number;
    profit: number;
    loss: number;
    netResult: number;
    balance: number;
    consecutiveWins: number;
    consecutiveLosses: number;
}
