import { injectable } from 'inversify';
import { ITradeRepository, TradeStats } from '../../../../domain/interfaces/ITradeRepository';
import { TradeRecord } from '../../../../domain/entities/TradeLifecycle';
import { TradeStatus } from '../../../../domain/enums/TradeStatus';
import { calculateTradeStats } from '../tradeStats';

@injectable()
export class InMemoryTradeRepository implements ITradeRepository {
    private trades: Map<string, TradeRecord> = new Map();

    async save(record: TradeRecord): Promise<void> {
        if (this.trades.has(record.tradeId)) {
            throw new Error(`Trade ${record.tradeId} already exists`);
        }
        this.trades.set(record.tradeId, { ...record });
    }

    async update(record: TradeRecord): Promise<void> {
        if (!this.trades.has(record.tradeId)) {
            throw new Error(`Trade ${record.tradeId} not found`);
        }
        this.trades.set(record.tradeId, { ...record });
    }

    async findOpen(): Promise<TradeRecord[]> {
        return [...this.trades.values()]
            .filter(t => t.status === TradeStatus.PENDING || t.status === TradeStatus.ACTIVE)
            .map(t => ({ ...t }));
    }

    async getHistory(limit: number = 100): Promise<TradeRecord[]> {
        return [...this.trades.values()]
            .sort((a, b) => b.submittedAt - a.submittedAt)
            .slice(0, limit)
            .map(t => ({ ...t }));
    }

    async getStats(): Promise<TradeStats> {
        return calculateTradeStats(
            [...this.trades.values()].filter(t => t.status === TradeStatus.SETTLED)
        );
    }
}
