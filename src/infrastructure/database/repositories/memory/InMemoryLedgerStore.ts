import { injectable } from 'inversify';
import { ILedgerStore } from '../../../../domain/interfaces/ILedgerStore';
import { LedgerSnapshot } from '../../../../domain/value-objects/LedgerSnapshot';

@injectable()
export class InMemoryLedgerStore implements ILedgerStore {
    private snapshot: LedgerSnapshot | null = null;

    async load(): Promise<LedgerSnapshot | null> {
        return this.snapshot ? { ...this.snapshot } : null;
    }

    async save(snapshot: LedgerSnapshot): Promise<void> {
        this.snapshot = { ...snapshot };
    }
}
