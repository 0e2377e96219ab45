export interface DerivError {
    code: string;
    message: string;
}

export interface DerivProposal {
    id: string;
    ask_price: number;
    payout: number;
}

export interface DerivBuy {
    contract_id: number;
    buy_price: number;
    transaction_id: number;
}

export interface DerivOpenContract {
    contract_id: number;
    status: 'open' | 'won' | 'lost' | 'sold' | null;
    is_sold: 0 | 1;
    profit?: number;
}

export interface DerivResponse {
    msg_type: string;
    req_id?: number;
    error?: DerivError;
    proposal?: DerivProposal;
    buy?: DerivBuy;
    proposal_open_contract?: DerivOpenContract;
}

export type DerivRequest = Record<string, string | number>;
