import { TradeDirection } from '../enums/TradeDirection';
import { TradeStatus, TERMINAL_STATUSES } from '../enums/TradeStatus';
import { InvariantViolationError } from '../errors/AppErrors';

export interface TradeRecord {
    tradeId: string;
    instrument: string;
    direction: TradeDirection;
    stake: number;
    expiryMs: number;
    submittedAt: number;
    status: TradeStatus;
    /** Signed profit/loss, null until settled. */
    result: number | null;
    finalizedAt: number | null;
    reason: string | null;
}

interface StateTransition {
    from: TradeStatus;
    to: TradeStatus;
    timestamp: number;
    reason: string;
}

const VALID_TRANSITIONS: Record<TradeStatus, TradeStatus[]> = {
    [TradeStatus.PENDING]: [TradeStatus.ACTIVE, TradeStatus.REJECTED, TradeStatus.EXPIRED_UNKNOWN],
    [TradeStatus.ACTIVE]: [TradeStatus.SETTLED, TradeStatus.EXPIRED_UNKNOWN],
    [TradeStatus.SETTLED]: [],
    [TradeStatus.REJECTED]: [],
    [TradeStatus.EXPIRED_UNKNOWN]: []
};

/**
 * Per-order state machine from submission to a terminal state.
 */
export class TradeLifecycle {
    private status: TradeStatus;
    private result: number | null;
    private finalizedAt: number | null;
    private reason: string | null;
    private history: StateTransition[] = [];

    constructor(
        public readonly tradeId: string,
        public readonly instrument: string,
        public readonly direction: TradeDirection,
        public readonly stake: number,
        public readonly expiryMs: number,
        public readonly submittedAt: number,
        status: TradeStatus = TradeStatus.PENDING
    ) {
        this.status = status;
        this.result = null;
        this.finalizedAt = null;
        this.reason = null;
    }

    /** Rebuilds a non-terminal lifecycle from its archived record. */
    static fromRecord(record: TradeRecord): TradeLifecycle {
        if (TERMINAL_STATUSES.includes(record.status)) {
            throw new InvariantViolationError(`Trade ${record.tradeId} is already terminal`, { status: record.status });
        }
        return new TradeLifecycle(
            record.tradeId,
            record.instrument,
            record.direction,
            record.stake,
            record.expiryMs,
            record.submittedAt,
            record.status
        );
    }

    getStatus(): TradeStatus {
        return this.status;
    }

    getResult(): number | null {
        return this.result;
    }

    isTerminal(): boolean {
        return TERMINAL_STATUSES.includes(this.status);
    }

    /** Latest time an outcome may still arrive before the trade counts as unknown. */
    deadline(graceMs: number): number {
        return this.submittedAt + this.expiryMs + graceMs;
    }

    canTransition(next: TradeStatus): boolean {
        return VALID_TRANSITIONS[this.status].includes(next);
    }

    activate(timestamp: number): void {
        this.transition(TradeStatus.ACTIVE, timestamp, 'acknowledged by venue');
    }

    settle(result: number, timestamp: number): void {
        if (!Number.isFinite(result)) {
            throw new InvariantViolationError(`Trade ${this.tradeId} settled with a non-finite result`, { result });
        }
        this.transition(TradeStatus.SETTLED, timestamp, 'settled by venue');
        this.result = result;
    }

    reject(reason: string, timestamp: number): void {
        this.transition(TradeStatus.REJECTED, timestamp, reason);
    }

    expireUnknown(timestamp: number, reason = 'no outcome before expiry + grace'): void {
        this.transition(TradeStatus.EXPIRED_UNKNOWN, timestamp, reason);
    }

    getHistory(): StateTransition[] {
        return [...this.history];
    }

    toRecord(): TradeRecord {
        return {
            tradeId: this.tradeId,
            instrument: this.instrument,
            direction: this.direction,
            stake: this.stake,
            expiryMs: this.expiryMs,
            submittedAt: this.submittedAt,
            status: this.status,
            result: this.result,
            finalizedAt: this.finalizedAt,
            reason: this.reason
        };
    }

    private transition(next: TradeStatus, timestamp: number, reason: string): void {
        if (!this.canTransition(next)) {
            throw new InvariantViolationError(
                `Invalid transition for trade ${this.tradeId}: ${this.status} → ${next}`,
                { tradeId: this.tradeId, from: this.status, to: next }
            );
        }

        this.history.push({ from: this.status, to: next, timestamp, reason });
        this.status = next;

        if (this.isTerminal()) {
            this.finalizedAt = timestamp;
            this.reason = reason;
        }
    }
}
