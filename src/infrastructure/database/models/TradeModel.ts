import mongoose, { Schema } from 'mongoose';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { TradeStatus } from '../../../domain/enums/TradeStatus';

export interface TradeDocument {
    tradeId: string;
    instrument: string;
    direction: TradeDirection;
    stake: number;
    expiryMs: number;
    submittedAt: number;
    status: TradeStatus;
    result: number | null;
    finalizedAt: number | null;
    reason: string | null;
}

const TradeSchema = new Schema<TradeDocument>({
    tradeId: { type: String, required: true, unique: true },
    instrument: { type: String, required: true, index: true },
    direction: { type: String, enum: Object.values(TradeDirection), required: true },
    stake: { type: Number, required: true },
    expiryMs: { type: Number, required: true },
    submittedAt: { type: Number, required: true },
    status: { type: String, enum: Object.values(TradeStatus), required: true, index: true },
    result: { type: Number, default: null },
    finalizedAt: { type: Number, default: null },
    reason: { type: String, default: null }
}, {
    collection: 'trades',
    timestamps: false
});

TradeSchema.index({ submittedAt: -1 });

export const TradeModel = mongoose.model<TradeDocument>('Trade', TradeSchema);
