import { Ledger } from '../entities/Ledger';
import { RiskLimits } from '../value-objects/RiskLimits';

export interface IStakeSizer {
    size(ledger: Ledger, limits: RiskLimits): number;
}
