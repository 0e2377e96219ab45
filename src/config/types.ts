export const TYPES = {
    TradingConfig: Symbol.for('TradingConfig'),
    IClock: Symbol.for('IClock'),
    IExecutionPort: Symbol.for('IExecutionPort'),
    ISignalProducer: Symbol.for('ISignalProducer'),
    IMarketConditionFilter: Symbol.for('IMarketConditionFilter'),
    IRiskGate: Symbol.for('IRiskGate'),
    IStakeSizer: Symbol.for('IStakeSizer'),
    ILedgerStore: Symbol.for('ILedgerStore'),
    ITradeRepository: Symbol.for('ITradeRepository'),
    ITickEventSink: Symbol.for('ITickEventSink'),
    Sleep: Symbol.for('Sleep'),
    RandomSource: Symbol.for('RandomSource'),
    SignalScript: Symbol.for('SignalScript')
};
