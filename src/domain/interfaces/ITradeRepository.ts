import { TradeRecord } from '../entities/TradeLifecycle';

export interface TradeStats {
    total: number;
    wins: number;
    losses: number;
    winRate: number;
    totalPnl: number;
    profitFactor: number;
    maxConsecutiveWins: number;
    maxConsecutiveLosses: number;
}

export interface ITradeRepository {
    save(record: TradeRecord): Promise<void>;
    update(record: TradeRecord): Promise<void>;
    findOpen(): Promise<TradeRecord[]>;
    getHistory(limit?: number): Promise<TradeRecord[]>;
    getStats(): Promise<TradeStats>;
}
