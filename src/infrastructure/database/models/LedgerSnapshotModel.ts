import mongoose, { Schema } from 'mongoose';
import { LedgerSnapshot } from '../../../domain/value-objects/LedgerSnapshot';

export interface LedgerSnapshotDocument extends LedgerSnapshot {
    key: string;
    savedAt: Date;
}

const LedgerSnapshotSchema = new Schema<LedgerSnapshotDocument>({
    key: { type: String, required: true, unique: true },
    balance: { type: Number, required: true },
    peakBalance: { type: Number, required: true },
    sessionDate: { type: String, required: true },
    dailyTrades: { type: Number, required: true },
    dailyWins: { type: Number, required: true },
    dailyLosses: { type: Number, required: true },
    dailyProfit: { type: Number, required: true },
    dailyLoss: { type: Number, required: true },
    consecutiveWins: { type: Number, required: true },
    consecutiveLosses: { type: Number, required: true },
    savedAt: { type: Date, default: Date.now }
}, {
    collection: 'ledger_snapshots',
    timestamps: false
});

export const LedgerSnapshotModel = mongoose.model<LedgerSnapshotDocument>('LedgerSnapshot', LedgerSnapshotSchema);
