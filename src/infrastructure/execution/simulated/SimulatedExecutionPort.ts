import { injectable, inject } from 'inversify';
import {
    IExecutionPort,
    OrderRequest,
    ContractOutcome,
    VenueCredentials
} from '../../../domain/interfaces/IExecutionPort';
import { IClock } from '../../../domain/interfaces/IClock';
import { ConnectionError, SubmissionError } from '../../../domain/errors/AppErrors';
import { TradingConfig } from '../../../config/trading.config';
import { TYPES } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';

export type RandomSource = () => number;

interface SimulatedContract {
    order: OrderRequest;
    submittedAt: number;
    outcome: ContractOutcome | null;
}

/**
 * Paper venue. Contracts settle once their expiry has passed on the injected clock;
 * a win pays stake × payoutRatio, a loss costs the stake.
 */
@injectable()
export class SimulatedExecutionPort implements IExecutionPort {
    private logger = Logger.getInstance();
    private contracts: Map<string, SimulatedContract> = new Map();
    private connected = false;
    private sequence = 0;

    private readonly payoutRatio: number;
    private readonly winProbability: number;

    constructor(
        @inject(TYPES.TradingConfig) config: TradingConfig,
        @inject(TYPES.IClock) private readonly clock: IClock,
        @inject(TYPES.RandomSource) private readonly random: RandomSource
    ) {
        this.payoutRatio = config.paper.payoutRatio;
        this.winProbability = config.paper.winProbability;
    }

    async connect(_credentials: VenueCredentials): Promise<void> {
        this.connected = true;
        this.logger.info('[PAPER] Connected to simulated venue');
    }

    async submit(order: OrderRequest): Promise<string> {
        if (!this.connected) {
            throw new ConnectionError('Simulated venue is not connected');
        }
        if (!(order.stake > 0)) {
            throw new SubmissionError(`Stake must be positive, got ${order.stake}`, order.instrument);
        }

        const submittedAt = this.clock.now().getTime();
        const tradeId = `paper_${submittedAt}_${++this.sequence}`;
        this.contracts.set(tradeId, { order, submittedAt, outcome: null });

        this.logger.info(
            `[PAPER] Contract ${tradeId} ${order.direction} ${order.instrument} ` +
            `| Stake: ${order.stake.toFixed(2)} | Expiry: ${Math.round(order.expiryMs / 1000)}s`
        );
        return tradeId;
    }

    async pollOutcome(tradeId: string): Promise<ContractOutcome> {
        if (!this.connected) {
            throw new ConnectionError('Simulated venue is not connected');
        }

        const contract = this.contracts.get(tradeId);
        if (!contract) {
            return { status: 'REJECTED', reason: `unknown contract ${tradeId}` };
        }
        if (contract.outcome) {
            return contract.outcome;
        }

        const now = this.clock.now().getTime();
        if (now < contract.submittedAt + contract.order.expiryMs) {
            return { status: 'ACTIVE' };
        }

        const won = this.random() < this.winProbability;
        const profit = won
            ? Number((contract.order.stake * this.payoutRatio).toFixed(2))
            : -contract.order.stake;
        contract.outcome = { status: 'SETTLED', profit };
        return contract.outcome;
    }

    isHealthy(): boolean {
        return this.connected;
    }

    async disconnect(): Promise<void> {
        this.connected = false;
        this.logger.info('[PAPER] Disconnected from simulated venue');
    }
}
