import { LedgerSnapshot } from '../value-objects/LedgerSnapshot';

export interface ILedgerStore {
    load(): Promise<LedgerSnapshot | null>;
    save(snapshot: LedgerSnapshot): Promise<void>;
}
