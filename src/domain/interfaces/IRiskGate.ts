import { Ledger } from '../entities/Ledger';
import { RiskLimits } from '../value-objects/RiskLimits';
import { RiskDecision, MarketCheck } from '../value-objects/RiskDecision';

export interface IRiskGate {
    evaluate(ledger: Ledger, limits: RiskLimits, proposedStake: number, marketCheck?: MarketCheck): RiskDecision;
}
