import { injectable, inject } from 'inversify';
import { IMarketConditionFilter } from '../../../domain/interfaces/IMarketConditionFilter';
import { MarketCheck } from '../../../domain/value-objects/RiskDecision';
import { TradingConfig } from '../../../config/trading.config';
import { TYPES } from '../../../config/types';

interface BlackoutWindow {
    start: number;
    end: number;
}

/**
 * Vetoes trading inside configured high-impact news windows.
 */
@injectable()
export class MarketConditionFilter implements IMarketConditionFilter {
    private windows: BlackoutWindow[];

    constructor(@inject(TYPES.TradingConfig) config: TradingConfig) {
        this.windows = config.newsBlackouts.map(b => {
            const start = Date.parse(b.start);
            return { start, end: start + b.durationMinutes * 60_000 };
        });
    }

    addBlackout(start: Date, durationMinutes: number): void {
        this.windows.push({ start: start.getTime(), end: start.getTime() + durationMinutes * 60_000 });
    }

    check(_instrument: string, now: Date): MarketCheck {
        const ts = now.getTime();
        const active = this.windows.find(w => w.start <= ts && ts <= w.end);
        if (active) {
            return {
                allowed: false,
                reason: `news blackout until ${new Date(active.end).toISOString()}`
            };
        }
        return { allowed: true };
    }
}
