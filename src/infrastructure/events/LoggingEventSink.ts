import { injectable, inject } from 'inversify';
import { ITickEventSink } from '../../domain/interfaces/ITickEventSink';
import { TickEvent } from '../../domain/value-objects/TickEvent';
import { TickEventKind } from '../../domain/enums/TickEventKind';
import { TradingConfig } from '../../config/trading.config';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';
import { formatTimestamp } from '../../shared/utils/time';

/**
 * Writes tick events to the log and raises threshold alerts as warnings.
 * Delivery to other channels belongs to whoever consumes the log.
 */
@injectable()
export class LoggingEventSink implements ITickEventSink {
    private logger = Logger.getInstance();
    private readonly alerts: TradingConfig['alerts'];

    constructor(@inject(TYPES.TradingConfig) config: TradingConfig) {
        this.alerts = config.alerts;
    }

    publish(event: TickEvent): void {
        const prefix = `[${formatTimestamp(new Date(event.timestamp))}] [${event.kind}]` +
            (event.instrument ? ` ${event.instrument}` : '');
        const reasons = event.reasons.length > 0 ? ` | ${event.reasons.join('; ')}` : '';
        const stake = event.stake !== undefined ? ` | Stake: ${event.stake.toFixed(2)}` : '';
        const trade = event.tradeId ? ` | Trade: ${event.tradeId}` : '';
        const result = event.result !== undefined ? ` | Result: ${event.result.toFixed(2)}` : '';
        const line = `${prefix}${trade}${stake}${result}${reasons}`;

        switch (event.kind) {
            case TickEventKind.EXPIRED_UNKNOWN:
                this.logger.error(`${line} | MANUAL RECONCILIATION REQUIRED`, event.ledgerSnapshot);
                break;
            case TickEventKind.HALTED:
                this.logger.error(line, event.metrics ?? event.ledgerSnapshot);
                break;
            case TickEventKind.ABORTED:
            case TickEventKind.DENIED:
            case TickEventKind.REJECTED:
                this.logger.warn(line);
                break;
            case TickEventKind.NO_SIGNAL:
                this.logger.debug(line);
                break;
            default:
                this.logger.info(line);
        }

        this.checkThresholds(event);
    }

    private checkThresholds(event: TickEvent): void {
        if (event.kind !== TickEventKind.SETTLED) return;

        const { balance, peakBalance, consecutiveLosses } = event.ledgerSnapshot;
        const drawdown = peakBalance > 0 ? ((peakBalance - balance) / peakBalance) * 100 : 0;

        if (drawdown > this.alerts.drawdownPercent) {
            this.logger.warn(`[ALERT] High drawdown: ${drawdown.toFixed(2)}% | Balance: ${balance.toFixed(2)}`);
        }
        if (consecutiveLosses >= this.alerts.consecutiveLosses) {
            this.logger.warn(`[ALERT] ${consecutiveLosses} consecutive losses`);
        }
        if (event.result !== undefined && event.result < 0 && Math.abs(event.result) > this.alerts.largeLossAmount) {
            this.logger.warn(
                `[ALERT] Large loss of ${Math.abs(event.result).toFixed(2)} on trade ${event.tradeId ?? 'N/A'}`
            );
        }
    }
}
