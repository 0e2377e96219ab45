import { injectable, inject } from 'inversify';
import { Ledger } from '../../domain/entities/Ledger';
import { TradeLifecycle, TradeRecord } from '../../domain/entities/TradeLifecycle';
import { TickEventKind } from '../../domain/enums/TickEventKind';
import {
    AppError,
    ConnectionError,
    InvariantViolationError,
    SettlementUnknownError,
    SubmissionError,
    TickTimeoutError,
    toError
} from '../../domain/errors/AppErrors';
import { IClock } from '../../domain/interfaces/IClock';
import { IExecutionPort, OrderRequest } from '../../domain/interfaces/IExecutionPort';
import { ILedgerStore } from '../../domain/interfaces/ILedgerStore';
import { IMarketConditionFilter } from '../../domain/interfaces/IMarketConditionFilter';
import { IRiskGate } from '../../domain/interfaces/IRiskGate';
import { ISignalProducer } from '../../domain/interfaces/ISignalProducer';
import { IStakeSizer } from '../../domain/interfaces/IStakeSizer';
import { ITickEventSink } from '../../domain/interfaces/ITickEventSink';
import { ITradeRepository } from '../../domain/interfaces/ITradeRepository';
import { DailySummary, LedgerSnapshot } from '../../domain/value-objects/LedgerSnapshot';
import { RiskLimits } from '../../domain/value-objects/RiskLimits';
import { RiskMetrics } from '../../domain/value-objects/RiskMetrics';
import { TickEvent } from '../../domain/value-objects/TickEvent';
import { TradingConfig } from '../../config/trading.config';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';
import { Sleep, withDeadline } from '../../shared/utils/time';
import { TradeTracker, OutcomeObservation } from '../services/execution/TradeTracker';
import { RiskMetricsCalculator } from '../services/risk/RiskMetricsCalculator';

export interface TickOutcome {
    /** The loop must not tick again. */
    halted: boolean;
    /** The tick stopped early without mutating the ledger further. */
    aborted: boolean;
    /** The tick did not run at all. */
    skipped: boolean;
    haltReasons: string[];
    events: TickEvent[];
    metrics: RiskMetrics;
}

type EventFields = Partial<Omit<TickEvent, 'timestamp' | 'kind' | 'ledgerSnapshot'>>;

/**
 * The control loop. Sole owner and writer of the ledger.
 *
 * A tick rolls the ledger over, runs signal → stake → gate → submit for every
 * instrument in turn, reconciles open trades, then checks the stop conditions.
 * Venue I/O happens before ledger mutation, never while it is in progress.
 */
@injectable()
export class RunTradingSession {
    private logger = Logger.getInstance();
    private ledger: Ledger;
    private readonly limits: RiskLimits;
    private readonly metricsCalculator = new RiskMetricsCalculator();

    private isRunning = false;
    private tickInProgress = false;
    private halted = false;
    private haltReasons: string[] = [];
    private connectionFailures = 0;

    constructor(
        @inject(TYPES.TradingConfig) private readonly config: TradingConfig,
        @inject(TYPES.IClock) private readonly clock: IClock,
        @inject(TYPES.ISignalProducer) private readonly signals: ISignalProducer,
        @inject(TYPES.IStakeSizer) private readonly stakeSizer: IStakeSizer,
        @inject(TYPES.IRiskGate) private readonly riskGate: IRiskGate,
        @inject(TYPES.IMarketConditionFilter) private readonly marketFilter: IMarketConditionFilter,
        @inject(TYPES.IExecutionPort) private readonly port: IExecutionPort,
        @inject(TradeTracker) private readonly tracker: TradeTracker,
        @inject(TYPES.ILedgerStore) private readonly ledgerStore: ILedgerStore,
        @inject(TYPES.ITradeRepository) private readonly tradeRepo: ITradeRepository,
        @inject(TYPES.ITickEventSink) private readonly sink: ITickEventSink,
        @inject(TYPES.Sleep) private readonly sleep: Sleep
    ) {
        this.limits = config.risk;
        this.ledger = new Ledger(config.initialBalance, clock.now());
    }

    // ═══════════════════════════════════════════
    // Session control
    // ═══════════════════════════════════════════

    /**
     * Loads the persisted ledger and every open trade. Open trades are
     * reconciled against the venue on the next tick, never settled locally.
     */
    async restore(): Promise<void> {
        const snapshot = await this.ledgerStore.load();
        if (snapshot) {
            this.ledger = Ledger.restore(snapshot);
            this.logger.info('[SESSION] Ledger restored', snapshot);
        }

        const open = await this.tradeRepo.findOpen();
        const restored = this.tracker.restore(open);
        if (restored > 0) {
            this.logger.info(`[SESSION] ${restored} open trade(s) restored for reconciliation`);
        }
    }

    async start(): Promise<void> {
        await this.restore();
        await this.port.connect({
            appId: this.config.venue.appId,
            apiToken: this.config.venue.apiToken
        });

        this.logger.info('[SESSION] Starting trading session', {
            mode: this.config.mode,
            instruments: this.config.instruments,
            tickIntervalMs: this.config.tickIntervalMs
        });
        this.isRunning = true;

        try {
            while (this.isRunning) {
                const outcome = await this.tick();
                if (outcome.halted) break;
                await this.sleep(this.config.tickIntervalMs);
            }
        } finally {
            this.isRunning = false;
            await this.port.disconnect();
            this.logger.info('[SESSION] Trading session stopped', this.ledger.dailySummary());
        }
    }

    /** Ends the schedule after the current tick. Open trades stay open. */
    stop(): void {
        this.logger.info('[SESSION] Stop requested');
        this.isRunning = false;
    }

    isHalted(): boolean {
        return this.halted;
    }

    getLedgerSnapshot(): LedgerSnapshot {
        return this.ledger.snapshot();
    }

    getDailySummary(): DailySummary {
        return this.ledger.dailySummary();
    }

    getMetrics(): RiskMetrics {
        return this.metricsCalculator.calculate(this.ledger, this.limits);
    }

    // ═══════════════════════════════════════════
    // Tick
    // ═══════════════════════════════════════════

    async tick(): Promise<TickOutcome> {
        if (this.halted) {
            return this.outcome([], { skipped: true });
        }
        if (this.tickInProgress) {
            this.logger.warn('[SESSION] Tick already in progress, skipping');
            return this.outcome([], { skipped: true });
        }

        this.tickInProgress = true;
        const events: TickEvent[] = [];
        const deadline = Date.now() + this.config.tickTimeoutMs;
        let aborted = false;
        let ledgerChanged = false;

        try {
            if (this.ledger.rolloverIfNewDay(this.clock.now())) {
                ledgerChanged = true;
                this.logger.info(`[SESSION] New trading day ${this.ledger.getSessionDate()}, daily counters reset`);
            }

            for (const instrument of this.config.instruments) {
                await this.processInstrument(instrument, deadline, events);
            }

            if (await this.reconcile(deadline, events)) {
                ledgerChanged = true;
            }
            this.connectionFailures = 0;
        } catch (error) {
            aborted = true;
            this.handleTickError(toError(error), events);
        } finally {
            this.tickInProgress = false;
        }

        if (ledgerChanged) {
            await this.persistLedger();
        }

        const haltReasons = this.metricsCalculator.haltReasons(this.ledger, this.limits);
        if (this.connectionFailures >= this.config.maxConnectionFailures) {
            haltReasons.push(`venue unreachable for ${this.connectionFailures} consecutive ticks`);
        }
        if (haltReasons.length > 0) {
            this.halt(haltReasons, events);
        }

        return this.outcome(events, { aborted });
    }

    private async processInstrument(instrument: string, deadline: number, events: TickEvent[]): Promise<void> {
        const now = this.clock.now();
        const signal = await withDeadline(
            this.signals.nextSignal(instrument, now),
            deadline,
            () => this.timeoutError(`signal for ${instrument}`)
        );

        if (!signal) {
            this.emit(events, TickEventKind.NO_SIGNAL, { instrument });
            return;
        }

        const stake = this.stakeSizer.size(this.ledger, this.limits);
        const marketCheck = this.marketFilter.check(instrument, now);
        const decision = this.riskGate.evaluate(this.ledger, this.limits, stake, marketCheck);

        if (!decision.allowed) {
            this.emit(events, TickEventKind.DENIED, { instrument, stake, reasons: [...decision.reasons] });
            return;
        }

        const order: OrderRequest = {
            instrument,
            direction: signal.direction,
            stake,
            expiryMs: signal.expiryMs
        };
        const submission = this.port.submit(order);

        let tradeId: string;
        try {
            tradeId = await withDeadline(submission, deadline, () => this.timeoutError(`submission for ${instrument}`));
        } catch (error) {
            if (error instanceof SubmissionError) {
                this.emit(events, TickEventKind.REJECTED, { instrument, stake, reasons: [error.message] });
                return;
            }
            if (error instanceof SettlementUnknownError) {
                this.reportUnacknowledged(error, events);
                return;
            }
            if (error instanceof TickTimeoutError) {
                this.adoptLateSubmission(submission, order, now.getTime());
            }
            throw error;
        }

        const lifecycle = new TradeLifecycle(
            tradeId,
            instrument,
            signal.direction,
            stake,
            signal.expiryMs,
            now.getTime()
        );
        this.tracker.register(lifecycle);
        await this.archive(lifecycle.toRecord(), 'save');

        this.emit(events, TickEventKind.SUBMITTED, {
            instrument,
            stake,
            tradeId,
            reasons: signal.reason ? [signal.reason] : []
        });
    }

    /**
     * Polls every open trade, then applies all resulting transitions and ledger
     * updates in one pass. Returns true when the ledger changed.
     */
    private async reconcile(deadline: number, events: TickEvent[]): Promise<boolean> {
        const open = this.tracker.getOpen();
        if (open.length === 0) return false;

        const observations: OutcomeObservation[] = await withDeadline(
            Promise.all(open.map(async lifecycle => ({
                tradeId: lifecycle.tradeId,
                outcome: await this.port.pollOutcome(lifecycle.tradeId)
            }))),
            deadline,
            () => this.timeoutError('outcome polling')
        );

        const now = this.clock.now().getTime();
        const changes = this.tracker.plan(observations, now, this.config.expiryGraceMs);

        let ledgerChanged = false;
        const records: TradeRecord[] = [];

        for (const change of changes) {
            const { record, terminal } = this.tracker.commit(change, now);
            records.push(record);

            if (terminal?.type === 'settle') {
                this.ledger.applyResult(record.stake, terminal.result);
                ledgerChanged = true;
                this.emit(events, TickEventKind.SETTLED, {
                    instrument: record.instrument,
                    stake: record.stake,
                    tradeId: record.tradeId,
                    result: terminal.result
                });
            } else if (terminal?.type === 'expire') {
                this.emit(events, TickEventKind.EXPIRED_UNKNOWN, {
                    instrument: record.instrument,
                    stake: record.stake,
                    tradeId: record.tradeId,
                    reasons: [terminal.reason]
                });
            } else if (terminal?.type === 'reject') {
                this.emit(events, TickEventKind.REJECTED, {
                    instrument: record.instrument,
                    stake: record.stake,
                    tradeId: record.tradeId,
                    reasons: [terminal.reason]
                });
            }
        }

        for (const record of records) {
            await this.archive(record, 'update');
        }
        return ledgerChanged;
    }

    // ═══════════════════════════════════════════
    // Failure handling
    // ═══════════════════════════════════════════

    private handleTickError(error: Error, events: TickEvent[]): void {
        if (error instanceof ConnectionError) {
            this.connectionFailures++;
            this.logger.warn(
                `[SESSION] Venue unreachable (${this.connectionFailures}/${this.config.maxConnectionFailures}), tick skipped`,
                error.message
            );
        } else if (error instanceof TickTimeoutError) {
            this.logger.warn(`[SESSION] ${error.message}, tick aborted`);
        } else if (error instanceof InvariantViolationError) {
            this.logger.error(`[SESSION] Invariant violation, tick aborted: ${error.message}`, {
                context: error.context,
                ledger: this.ledger.snapshot()
            });
        } else {
            this.logger.error('[SESSION] Unexpected error, tick aborted', error);
        }

        const code = error instanceof AppError ? error.code : 'UNEXPECTED';
        this.emit(events, TickEventKind.ABORTED, { reasons: [`${code}: ${error.message}`] });
    }

    private halt(reasons: string[], events: TickEvent[]): void {
        this.halted = true;
        this.haltReasons = reasons;
        const metrics = this.metricsCalculator.calculate(this.ledger, this.limits);

        this.logger.error(`[SESSION] Trading halted: ${reasons.join('; ')}`, metrics);
        this.emit(events, TickEventKind.HALTED, { reasons: [...reasons], metrics });
    }

    /**
     * A submission that outlived the tick may still be filled by the venue.
     * Track it once it resolves so it is reconciled like any other trade.
     */
    private adoptLateSubmission(submission: Promise<string>, order: OrderRequest, submittedAt: number): void {
        void submission
            .then(async tradeId => {
                const lifecycle = new TradeLifecycle(
                    tradeId,
                    order.instrument,
                    order.direction,
                    order.stake,
                    order.expiryMs,
                    submittedAt
                );
                this.tracker.register(lifecycle);
                await this.archive(lifecycle.toRecord(), 'save');
                this.logger.warn(`[SESSION] Late acknowledgment for ${order.instrument}, tracking trade ${tradeId}`);
            }, (error: unknown) => {
                if (error instanceof SettlementUnknownError) {
                    this.reportUnacknowledged(error, []);
                    return;
                }
                this.logger.warn(
                    `[SESSION] Timed-out submission for ${order.instrument} failed`,
                    toError(error).message
                );
            })
            .catch((error: unknown) => {
                this.logger.error('[SESSION] Could not track late submission', toError(error));
            });
    }

    /** The venue may hold a contract the tracker never saw. */
    private reportUnacknowledged(error: SettlementUnknownError, events: TickEvent[]): void {
        this.emit(events, TickEventKind.EXPIRED_UNKNOWN, {
            instrument: error.instrument,
            stake: error.stake,
            reasons: [error.message]
        });
    }

    // ═══════════════════════════════════════════
    // Helpers
    // ═══════════════════════════════════════════

    private async archive(record: TradeRecord, op: 'save' | 'update'): Promise<void> {
        try {
            if (op === 'save') {
                await this.tradeRepo.save(record);
            } else {
                await this.tradeRepo.update(record);
            }
        } catch (error) {
            this.logger.error(`[SESSION] Failed to ${op} trade ${record.tradeId}`, toError(error));
        }
    }

    private async persistLedger(): Promise<void> {
        try {
            await this.ledgerStore.save(this.ledger.snapshot());
        } catch (error) {
            this.logger.error('[SESSION] Failed to persist ledger snapshot', toError(error));
        }
    }

    private emit(events: TickEvent[], kind: TickEventKind, fields: EventFields = {}): void {
        const event: TickEvent = {
            timestamp: this.clock.now().getTime(),
            kind,
            reasons: [],
            ...fields,
            ledgerSnapshot: this.ledger.snapshot()
        };
        events.push(event);
        this.sink.publish(event);
    }

    private timeoutError(stage: string): TickTimeoutError {
        return new TickTimeoutError(
            `Tick timed out after ${this.config.tickTimeoutMs}ms waiting for ${stage}`,
            this.config.tickTimeoutMs
        );
    }

    private outcome(events: TickEvent[], flags: { aborted?: boolean; skipped?: boolean }): TickOutcome {
        return {
            halted: this.halted,
            aborted: flags.aborted ?? false,
            skipped: flags.skipped ?? false,
            haltReasons: [...this.haltReasons],
            events,
            metrics: this.metricsCalculator.calculate(this.ledger, this.limits)
        };
    }
}
