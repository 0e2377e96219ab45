import { injectable } from 'inversify';
import { IStakeSizer } from '../../../domain/interfaces/IStakeSizer';
import { Ledger } from '../../../domain/entities/Ledger';
import { RiskLimits } from '../../../domain/value-objects/RiskLimits';
import { roundToIncrement } from '../../../shared/utils/money';

const STRONG_WIN_RATE = 0.7;
const WEAK_WIN_RATE = 0.5;
const LOSING_STREAK = 2;

@injectable()
export class StakeSizer implements IStakeSizer {
    size(ledger: Ledger, limits: RiskLimits): number {
        const baseStake = (ledger.getBalance() * limits.baseStakePercent) / 100;

        let multiplier = 1.0;
        if (ledger.hasSettledTradesToday()) {
            const winRate = ledger.getWinRate();
            if (winRate > STRONG_WIN_RATE) {
                multiplier = 1.2;
            } else if (winRate < WEAK_WIN_RATE) {
                multiplier = 0.8;
            }
        }

        if (ledger.getConsecutiveLosses() > LOSING_STREAK) {
            multiplier *= 0.5;
        }

        const clamped = Math.max(limits.minStake, Math.min(baseStake * multiplier, limits.maxStake));
        return roundToIncrement(clamped, limits.currencyIncrement, limits.minStake, limits.maxStake);
    }
}
