import { RiskLevel } from '../enums/RiskLevel';

export interface RiskMetrics {
    balance: number;
    peakBalance: number;
    dailyLoss: number;
    dailyProfit: number;
    dailyTrades: number;
    consecutiveLosses: number;
    consecutiveWins: number;
    currentDrawdownPercent: number;
    maxDrawdownPercent: number;
    winRate: number;
    riskLevel: RiskLevel;
}
