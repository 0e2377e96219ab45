import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';
import { TradingConfig } from './trading.config';

// Interfaces
import { IClock } from '../domain/interfaces/IClock';
import { IExecutionPort } from '../domain/interfaces/IExecutionPort';
import { ISignalProducer } from '../domain/interfaces/ISignalProducer';
import { IMarketConditionFilter } from '../domain/interfaces/IMarketConditionFilter';
import { IRiskGate } from '../domain/interfaces/IRiskGate';
import { IStakeSizer } from '../domain/interfaces/IStakeSizer';
import { ILedgerStore } from '../domain/interfaces/ILedgerStore';
import { ITradeRepository } from '../domain/interfaces/ITradeRepository';
import { ITickEventSink } from '../domain/interfaces/ITickEventSink';

// Implementations
import { SystemClock } from '../infrastructure/clock/SystemClock';
import { SimulatedExecutionPort, RandomSource } from '../infrastructure/execution/simulated/SimulatedExecutionPort';
import { DerivExecutionPort } from '../infrastructure/execution/deriv/DerivExecutionPort';
import { ReplaySignalProducer } from '../infrastructure/signals/ReplaySignalProducer';
import { SignalScript, loadSignalScript } from '../infrastructure/signals/signalScript';
import { MarketConditionFilter } from '../application/services/market/MarketConditionFilter';
import { RiskGate } from '../application/services/risk/RiskGate';
import { StakeSizer } from '../application/services/sizing/StakeSizer';
import { TradeTracker } from '../application/services/execution/TradeTracker';
import { LoggingEventSink } from '../infrastructure/events/LoggingEventSink';

// Repositories & UseCases
import { LedgerStore } from '../infrastructure/database/repositories/LedgerStore';
import { TradeRepository } from '../infrastructure/database/repositories/TradeRepository';
import { InMemoryLedgerStore } from '../infrastructure/database/repositories/memory/InMemoryLedgerStore';
import { InMemoryTradeRepository } from '../infrastructure/database/repositories/memory/InMemoryTradeRepository';
import { RunTradingSession } from '../application/use-cases/RunTradingSession';
import { Sleep, sleep } from '../shared/utils/time';

export { TYPES };

export function createContainer(config: TradingConfig): Container {
    const container = new Container();

    container.bind<TradingConfig>(TYPES.TradingConfig).toConstantValue(config);
    container.bind<IClock>(TYPES.IClock).to(SystemClock).inSingletonScope();
    container.bind<Sleep>(TYPES.Sleep).toConstantValue(sleep);
    container.bind<RandomSource>(TYPES.RandomSource).toConstantValue(Math.random);

    // --- Core Services ---
    container.bind<IRiskGate>(TYPES.IRiskGate).to(RiskGate).inSingletonScope();
    container.bind<IStakeSizer>(TYPES.IStakeSizer).to(StakeSizer).inSingletonScope();
    container.bind<IMarketConditionFilter>(TYPES.IMarketConditionFilter).to(MarketConditionFilter).inSingletonScope();
    container.bind<TradeTracker>(TradeTracker).toSelf().inSingletonScope();
    container.bind<ITickEventSink>(TYPES.ITickEventSink).to(LoggingEventSink).inSingletonScope();

    // --- Signals ---
    container.bind<SignalScript>(TYPES.SignalScript).toDynamicValue(() => loadSignalScript(config.signalsFile));
    container.bind<ISignalProducer>(TYPES.ISignalProducer).to(ReplaySignalProducer).inSingletonScope();

    // --- Repositories ---
    // Paper runs without a database keep everything in memory
    if (config.mongoUri) {
        container.bind<ILedgerStore>(TYPES.ILedgerStore).to(LedgerStore).inSingletonScope();
        container.bind<ITradeRepository>(TYPES.ITradeRepository).to(TradeRepository).inSingletonScope();
    } else {
        container.bind<ILedgerStore>(TYPES.ILedgerStore).to(InMemoryLedgerStore).inSingletonScope();
        container.bind<ITradeRepository>(TYPES.ITradeRepository).to(InMemoryTradeRepository).inSingletonScope();
    }

    // --- Execution venue: depends on mode ---
    if (config.mode === 'live') {
        container.bind<IExecutionPort>(TYPES.IExecutionPort).to(DerivExecutionPort).inSingletonScope();
    } else {
        container.bind<IExecutionPort>(TYPES.IExecutionPort).to(SimulatedExecutionPort).inSingletonScope();
    }

    container.bind<RunTradingSession>(RunTradingSession).toSelf().inSingletonScope();

    return container;
}
