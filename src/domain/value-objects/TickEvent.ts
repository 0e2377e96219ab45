import { TickEventKind } from '../enums/TickEventKind';
import { LedgerSnapshot } from './LedgerSnapshot';
import { RiskMetrics } from './RiskMetrics';

export interface TickEvent {
    timestamp: number;
    kind: TickEventKind;
    instrument?: string;
    reasons: string[];
    stake?: number;
    tradeId?: string;
    result?: number;
    metrics?: RiskMetrics;
    ledgerSnapshot: LedgerSnapshot;
}
