export enum TradeStatus {
    PENDING = 'PENDING',
    ACTIVE = 'ACTIVE',
    SETTLED = 'SETTLED',
    REJECTED = 'REJECTED',
    EXPIRED_UNKNOWN = 'EXPIRED_UNKNOWN'
}

export const TERMINAL_STATUSES: readonly TradeStatus[] = [
    TradeStatus.SETTLED,
    TradeStatus.REJECTED,
    TradeStatus.EXPIRED_UNKNOWN
];
