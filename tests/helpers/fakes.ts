import { IClock } from '../../src/domain/interfaces/IClock';
import {
    ContractOutcome,
    IExecutionPort,
    OrderRequest,
    VenueCredentials
} from '../../src/domain/interfaces/IExecutionPort';
import { ISignalProducer } from '../../src/domain/interfaces/ISignalProducer';
import { ITickEventSink } from '../../src/domain/interfaces/ITickEventSink';
import { CandidateSignal } from '../../src/domain/value-objects/CandidateSignal';
import { TickEvent } from '../../src/domain/value-objects/TickEvent';
import { TradeDirection } from '../../src/domain/enums/TradeDirection';
import { DEFAULT_TRADING_CONFIG, TradingConfig } from '../../src/config/trading.config';
import { RiskLimits } from '../../src/domain/value-objects/RiskLimits';

export class FakeClock implements IClock {
    private current: number;

    constructor(iso: string) {
        this.current = Date.parse(iso);
    }

    now(): Date {
        return new Date(this.current);
    }

    advance(ms: number): void {
        this.current += ms;
    }
}

/** A venue reply: a trade id, an error to throw, or a promise the test settles. */
export type SubmitReply = string | Error | Promise<string>;
export type PollReply = ContractOutcome | Error | Promise<ContractOutcome>;

export class ScriptedExecutionPort implements IExecutionPort {
    readonly orders: OrderRequest[] = [];
    readonly polled: string[] = [];
    connected = false;
    disconnected = false;

    private submitReplies: SubmitReply[] = [];
    private outcomes: Map<string, PollReply> = new Map();

    queueSubmit(...replies: SubmitReply[]): void {
        this.submitReplies.push(...replies);
    }

    setOutcome(tradeId: string, reply: PollReply): void {
        this.outcomes.set(tradeId, reply);
    }

    async connect(_credentials: VenueCredentials): Promise<void> {
        this.connected = true;
    }

    async submit(order: OrderRequest): Promise<string> {
        this.orders.push(order);
        const reply = this.submitReplies.shift();
        if (reply === undefined) {
            throw new Error('No submit reply scripted');
        }
        if (reply instanceof Error) throw reply;
        return reply;
    }

    async pollOutcome(tradeId: string): Promise<ContractOutcome> {
        this.polled.push(tradeId);
        const reply = this.outcomes.get(tradeId) ?? { status: 'PENDING' };
        if (reply instanceof Error) throw reply;
        return reply;
    }

    isHealthy(): boolean {
        return this.connected;
    }

    async disconnect(): Promise<void> {
        this.disconnected = true;
    }
}

export class ScriptedSignalProducer implements ISignalProducer {
    private queues: Map<string, Array<CandidateSignal | null>> = new Map();

    queue(instrument: string, ...signals: Array<CandidateSignal | null>): void {
        const queue = this.queues.get(instrument) ?? [];
        queue.push(...signals);
        this.queues.set(instrument, queue);
    }

    async nextSignal(instrument: string, _now: Date): Promise<CandidateSignal | null> {
        return this.queues.get(instrument)?.shift() ?? null;
    }
}

export class RecordingEventSink implements ITickEventSink {
    readonly events: TickEvent[] = [];

    publish(event: TickEvent): void {
        this.events.push(event);
    }
}

export function makeSignal(
    instrument = 'R_100',
    direction = TradeDirection.CALL,
    expiryMs = 60_000
): CandidateSignal {
    return CandidateSignal.create({
        instrument,
        direction,
        confidence: 0.7,
        expiryMs,
        createdAt: 0
    });
}

export function makeLimits(overrides: Partial<RiskLimits> = {}): RiskLimits {
    return { ...DEFAULT_TRADING_CONFIG.risk, ...overrides };
}

export function makeConfig(overrides: Partial<TradingConfig> = {}): TradingConfig {
    return { ...DEFAULT_TRADING_CONFIG, ...overrides };
}

/** A promise that never settles, for timeout paths. */
export function never<T>(): Promise<T> {
    return new Promise<T>(() => undefined);
}

export function deferred<T>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: Error) => void;
} {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: Error) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}
