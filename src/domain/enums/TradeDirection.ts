export enum TradeDirection {
    CALL = 'CALL',
    PUT = 'PUT'
}
