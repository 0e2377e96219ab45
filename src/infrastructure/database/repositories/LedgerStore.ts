import { injectable } from 'inversify';
import { ILedgerStore } from '../../../domain/interfaces/ILedgerStore';
import { LedgerSnapshot } from '../../../domain/value-objects/LedgerSnapshot';
import { LedgerSnapshotModel } from '../models/LedgerSnapshotModel';

const LEDGER_KEY = 'primary';

/**
 * Keeps the single ledger snapshot, overwritten in full on every save.
 */
@injectable()
export class LedgerStore implements ILedgerStore {
    async load(): Promise<LedgerSnapshot | null> {
        const doc = await LedgerSnapshotModel.findOne({ key: LEDGER_KEY }).lean();
        if (!doc) return null;

        return {
            balance: doc.balance,
            peakBalance: doc.peakBalance,
            sessionDate: doc.sessionDate,
            dailyTrades: doc.dailyTrades,
            dailyWins: doc.dailyWins,
            dailyLosses: doc.dailyLosses,
            dailyProfit: doc.dailyProfit,
            dailyLoss: doc.dailyLoss,
            consecutiveWins: doc.consecutiveWins,
            consecutiveLosses: doc.consecutiveLosses
        };
    }

    async save(snapshot: LedgerSnapshot): Promise<void> {
        await LedgerSnapshotModel.updateOne(
            { key: LEDGER_KEY },
            { $set: { ...snapshot, savedAt: new Date() } },
            { upsert: true }
        );
    }
}
