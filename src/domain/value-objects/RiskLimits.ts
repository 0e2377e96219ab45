export interface RiskLimits {
    readonly maxDailyLoss: number;
    readonly maxDailyTrades: number;
    readonly maxConsecutiveLosses: number;
    readonly maxDrawdownPercent: number;
    readonly minBalance: number;
    readonly baseStakePercent: number;
    readonly maxStakePercent: number;
    readonly minStake: number;
    readonly maxStake: number;
    /** Smallest amount the venue accepts as a stake step. */
    readonly currencyIncrement: number;
}
