import { injectable } from 'inversify';
import { ITradeRepository, TradeStats } from '../../../domain/interfaces/ITradeRepository';
import { TradeRecord } from '../../../domain/entities/TradeLifecycle';
import { TradeStatus } from '../../../domain/enums/TradeStatus';
import { TradeModel, TradeDocument } from '../models/TradeModel';
import { calculateTradeStats } from './tradeStats';

@injectable()
export class TradeRepository implements ITradeRepository {
    async save(record: TradeRecord): Promise<void> {
        await TradeModel.create({ ...record });
    }

    async update(record: TradeRecord): Promise<void> {
        const { tradeId, ...fields } = record;
        const res = await TradeModel.updateOne({ tradeId }, { $set: fields });
        if (res.matchedCount === 0) {
            throw new Error(`Trade ${tradeId} not found`);
        }
    }

    async findOpen(): Promise<TradeRecord[]> {
        const docs = await TradeModel
            .find({ status: { $in: [TradeStatus.PENDING, TradeStatus.ACTIVE] } })
            .sort({ submittedAt: 1 })
            .lean();

        return docs.map(toDomain);
    }

    async getHistory(limit: number = 100): Promise<TradeRecord[]> {
        const docs = await TradeModel.find().sort({ submittedAt: -1 }).limit(limit).lean();
        return docs.map(toDomain);
    }

    async getStats(): Promise<TradeStats> {
        const docs = await TradeModel.find({ status: TradeStatus.SETTLED }).lean();
        return calculateTradeStats(docs.map(toDomain));
    }
}

function toDomain(doc: TradeDocument): TradeRecord {
    return {
        tradeId: doc.tradeId,
        instrument: doc.instrument,
        direction: doc.direction,
        stake: doc.stake,
        expiryMs: doc.expiryMs,
        submittedAt: doc.submittedAt,
        status: doc.status,
        result: doc.result ?? null,
        finalizedAt: doc.finalizedAt ?? null,
        reason: doc.reason ?? null
    };
}
