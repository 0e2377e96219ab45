import { ContractOutcome } from '../../../domain/interfaces/IExecutionPort';
import { DerivOpenContract, DerivResponse } from './types/DerivTypes';

export class DerivContractMapper {
    static toOutcome(contract: DerivOpenContract): ContractOutcome {
        const finished = contract.is_sold === 1 ||
            contract.status === 'won' ||
            contract.status === 'lost' ||
            contract.status === 'sold';

        if (!finished) {
            return { status: 'ACTIVE' };
        }

        const profit = Number(contract.profit);
        if (!Number.isFinite(profit)) {
            // Sold but the venue has not reported the amount yet
            return { status: 'ACTIVE' };
        }
        return { status: 'SETTLED', profit };
    }

    static parse(raw: string): DerivResponse | null {
        let value: unknown;
        try {
            value = JSON.parse(raw);
        } catch {
            return null;
        }
        return isDerivResponse(value) ? value : null;
    }
}

function isDerivResponse(value: unknown): value is DerivResponse {
    return typeof value === 'object' &&
        value !== null &&
        'msg_type' in value &&
        typeof value.msg_type === 'string' &&
        (!('req_id' in value) || typeof value.req_id === 'number');
}
