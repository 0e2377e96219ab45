import WebSocket from 'ws';
import { injectable, inject } from 'inversify';
import {
    IExecutionPort,
    OrderRequest,
    ContractOutcome,
    VenueCredentials
} from '../../../domain/interfaces/IExecutionPort';
import { ConnectionError, SettlementUnknownError, SubmissionError, toError } from '../../../domain/errors/AppErrors';
import { TradingConfig } from '../../../config/trading.config';
import { TYPES } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';
import { Sleep } from '../../../shared/utils/time';
import { computeBackoff } from '../../../shared/utils/backoff';
import { DerivContractMapper } from './DerivContractMapper';
import { DerivRequest, DerivResponse } from './types/DerivTypes';

interface PendingRequest {
    resolve: (response: DerivResponse) => void;
    reject: (error: Error) => void;
    timer: NodeJS.Timeout;
}

/**
 * Live venue over the Deriv WebSocket API.
 *
 * A dropped connection is re-established lazily, with exponential backoff, by the
 * next request. Only `pollOutcome` is safe to repeat; `submit` is never replayed.
 */
@injectable()
export class DerivExecutionPort implements IExecutionPort {
    private logger = Logger.getInstance();
    private ws: WebSocket | null = null;
    private connected = false;
    private closedByUser = false;
    private credentials: VenueCredentials | null = null;
    private requestId = 1;
    private pending: Map<number, PendingRequest> = new Map();
    private reconnecting: Promise<void> | null = null;

    private readonly venue: TradingConfig['venue'];
    private readonly requestTimeoutMs: number;

    constructor(
        @inject(TYPES.TradingConfig) config: TradingConfig,
        @inject(TYPES.Sleep) private readonly sleep: Sleep
    ) {
        this.venue = config.venue;
        this.requestTimeoutMs = config.tickTimeoutMs;
    }

    async connect(credentials: VenueCredentials): Promise<void> {
        this.credentials = credentials;
        this.closedByUser = false;
        await this.openSocket();
    }

    async submit(order: OrderRequest): Promise<string> {
        const proposal = await this.request({
            proposal: 1,
            amount: order.stake,
            basis: 'stake',
            contract_type: order.direction,
            currency: this.venue.currency,
            duration: Math.max(1, Math.round(order.expiryMs / 1000)),
            duration_unit: 's',
            symbol: order.instrument
        });

        if (proposal.error || !proposal.proposal) {
            throw new SubmissionError(
                `Proposal refused: ${proposal.error?.message ?? 'empty proposal'}`,
                order.instrument
            );
        }

        const sent = { buy: false };
        let buy: DerivResponse;
        try {
            buy = await this.request(
                { buy: proposal.proposal.id, price: proposal.proposal.ask_price },
                () => { sent.buy = true; }
            );
        } catch (error) {
            if (!sent.buy) throw error;
            const cause = toError(error);
            throw new SettlementUnknownError(
                `Buy for ${order.instrument} sent without acknowledgment: ${cause.message}`,
                order.instrument,
                order.stake,
                cause
            );
        }

        if (buy.error || !buy.buy) {
            throw new SubmissionError(`Buy refused: ${buy.error?.message ?? 'empty buy response'}`, order.instrument);
        }

        this.logger.info(
            `[DERIV] Bought contract ${buy.buy.contract_id} ${order.direction} ${order.instrument} ` +
            `| Price: ${buy.buy.buy_price.toFixed(2)}`
        );
        return String(buy.buy.contract_id);
    }

    async pollOutcome(tradeId: string): Promise<ContractOutcome> {
        const response = await this.request({
            proposal_open_contract: 1,
            contract_id: Number(tradeId)
        });

        if (response.error) {
            this.logger.warn(`[DERIV] Contract ${tradeId} query failed: ${response.error.message}`);
            return { status: 'PENDING' };
        }
        if (!response.proposal_open_contract) {
            return { status: 'PENDING' };
        }
        return DerivContractMapper.toOutcome(response.proposal_open_contract);
    }

    isHealthy(): boolean {
        return this.connected;
    }

    async disconnect(): Promise<void> {
        this.closedByUser = true;
        this.connected = false;
        this.rejectPending(new ConnectionError('Connection closed by client'));
        this.ws?.close();
        this.ws = null;
        this.logger.info('[DERIV] Disconnected');
    }

    // ═══════════════════════════════════════════
    // Connection handling
    // ═══════════════════════════════════════════

    private async openSocket(): Promise<void> {
        const credentials = this.credentials;
        if (!credentials) {
            throw new ConnectionError('Cannot connect without credentials');
        }

        const url = `${this.venue.url}?app_id=${encodeURIComponent(credentials.appId)}`;
        this.logger.info(`[DERIV] Connecting to ${this.venue.url}...`);

        const ws = await new Promise<WebSocket>((resolve, reject) => {
            const socket = new WebSocket(url);
            let opened = false;

            const timer = setTimeout(() => {
                socket.terminate();
                reject(new ConnectionError(`Timed out connecting to ${this.venue.url}`));
            }, this.requestTimeoutMs);

            socket.on('open', () => {
                opened = true;
                clearTimeout(timer);
                this.ws = socket;
                this.connected = true;
                this.logger.info('[DERIV] Connected');
                resolve(socket);
            });

            socket.on('message', data => this.handleMessage(data.toString()));

            socket.on('error', err => {
                if (!opened) {
                    clearTimeout(timer);
                    reject(new ConnectionError(`Failed to connect to ${this.venue.url}`, err));
                    return;
                }
                this.logger.error('[DERIV] Socket error', err.message);
            });

            socket.on('close', () => this.handleClose(socket));
        });

        if (!credentials.apiToken) return;

        try {
            const response = await this.request({ authorize: credentials.apiToken });
            if (response.error) {
                throw new ConnectionError(`Authorization failed: ${response.error.message}`);
            }
        } catch (error) {
            // An unauthorized socket must not carry orders
            this.dropSocket(ws);
            throw error;
        }
    }

    private dropSocket(ws: WebSocket): void {
        if (this.ws === ws) {
            this.ws = null;
            this.connected = false;
        }
        ws.terminate();
    }

    private handleClose(ws: WebSocket): void {
        if (this.ws !== ws) return;

        this.ws = null;
        this.connected = false;
        this.rejectPending(new ConnectionError('Connection to venue lost'));

        if (!this.closedByUser) {
            this.logger.warn('[DERIV] Connection lost, will reconnect on next request');
        }
    }

    private async ensureConnected(): Promise<void> {
        if (this.connected) return;
        if (this.closedByUser || !this.credentials) {
            throw new ConnectionError('Venue connection is not open');
        }

        if (!this.reconnecting) {
            this.reconnecting = this.reconnect().finally(() => {
                this.reconnecting = null;
            });
        }
        await this.reconnecting;
    }

    private async reconnect(): Promise<void> {
        const { reconnectBaseMs, reconnectMaxMs, maxReconnectAttempts } = this.venue;
        let lastError: Error | undefined;

        for (let attempt = 0; attempt < maxReconnectAttempts; attempt++) {
            const delay = computeBackoff(attempt, reconnectBaseMs, reconnectMaxMs);
            this.logger.warn(`[DERIV] Reconnecting in ${delay}ms (attempt ${attempt + 1}/${maxReconnectAttempts})`);
            await this.sleep(delay);

            try {
                await this.openSocket();
                return;
            } catch (error) {
                lastError = toError(error);
                this.logger.warn(`[DERIV] Reconnect attempt ${attempt + 1} failed: ${lastError.message}`);
            }
        }

        throw new ConnectionError(`Venue unreachable after ${maxReconnectAttempts} reconnect attempts`, lastError);
    }

    // ═══════════════════════════════════════════
    // Request / response
    // ═══════════════════════════════════════════

    private async request(payload: DerivRequest, onSent?: () => void): Promise<DerivResponse> {
        await this.ensureConnected();

        const ws = this.ws;
        if (!ws) {
            throw new ConnectionError('Venue connection is not open');
        }

        const reqId = this.requestId++;
        return new Promise<DerivResponse>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pending.delete(reqId);
                reject(new ConnectionError(`Request ${reqId} timed out after ${this.requestTimeoutMs}ms`));
            }, this.requestTimeoutMs);

            this.pending.set(reqId, { resolve, reject, timer });

            ws.send(JSON.stringify({ ...payload, req_id: reqId }), err => {
                if (!err) {
                    onSent?.();
                    return;
                }
                clearTimeout(timer);
                this.pending.delete(reqId);
                reject(new ConnectionError(`Failed to send request ${reqId}`, err));
            });
        });
    }

    private handleMessage(raw: string): void {
        const message = DerivContractMapper.parse(raw);
        if (!message || message.req_id === undefined) return;

        const pending = this.pending.get(message.req_id);
        if (!pending) return;

        clearTimeout(pending.timer);
        this.pending.delete(message.req_id);
        pending.resolve(message);
    }

    private rejectPending(error: Error): void {
        for (const pending of this.pending.values()) {
            clearTimeout(pending.timer);
            pending.reject(error);
        }
        this.pending.clear();
    }
}
