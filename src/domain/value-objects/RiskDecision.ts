export interface RiskDecision {
    readonly allowed: boolean;
    readonly reasons: readonly string[];
}

export interface MarketCheck {
    readonly allowed: boolean;
    readonly reason?: string;
}
