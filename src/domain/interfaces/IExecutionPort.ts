import { TradeDirection } from '../enums/TradeDirection';

export interface VenueCredentials {
    appId: string;
    apiToken?: string;
}

export interface OrderRequest {
    instrument: string;
    direction: TradeDirection;
    stake: number;
    expiryMs: number;
}

export type ContractOutcome =
    | { status: 'PENDING' }
    | { status: 'ACTIVE' }
    | { status: 'SETTLED'; profit: number }
    | { status: 'REJECTED'; reason: string };

/**
 * Venue capability. Reconnection and retry are internal to implementations;
 * `submit` must never be replayed by a reconnect.
 */
export interface IExecutionPort {
    connect(credentials: VenueCredentials): Promise<void>;
    /** Resolves with the venue trade id; rejects with SubmissionError or ConnectionError. */
    submit(order: OrderRequest): Promise<string>;
    pollOutcome(tradeId: string): Promise<ContractOutcome>;
    isHealthy(): boolean;
    disconnect(): Promise<void>;
}
