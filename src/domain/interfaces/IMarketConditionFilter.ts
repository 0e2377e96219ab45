import { MarketCheck } from '../value-objects/RiskDecision';

export interface IMarketConditionFilter {
    check(instrument: string, now: Date): MarketCheck;
}
