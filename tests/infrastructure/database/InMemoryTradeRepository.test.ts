import { InMemoryTradeRepository } from '../../../src/infrastructure/database/repositories/memory/InMemoryTradeRepository';
import { InMemoryLedgerStore } from '../../../src/infrastructure/database/repositories/memory/InMemoryLedgerStore';
import { calculateTradeStats } from '../../../src/infrastructure/database/repositories/tradeStats';
import { TradeRecord } from '../../../src/domain/entities/TradeLifecycle';
import { TradeDirection } from '../../../src/domain/enums/TradeDirection';
import { TradeStatus } from '../../../src/domain/enums/TradeStatus';
import { Ledger } from '../../../src/domain/entities/Ledger';

function record(tradeId: string, submittedAt: number, status: TradeStatus, result: number | null = null): TradeRecord {
    return {
        tradeId,
        instrument: 'R_100',
        direction: TradeDirection.CALL,
        stake: 20,
        expiryMs: 60_000,
        submittedAt,
        status,
        result,
        finalizedAt: result === null ? null : submittedAt + 60_000,
        reason: null
    };
}

describe('calculateTradeStats', () => {
    it('summarises settled results in submission order', () => {
        const stats = calculateTradeStats([
            record('c', 3, TradeStatus.SETTLED, -20),
            record('a', 1, TradeStatus.SETTLED, 16),
            record('b', 2, TradeStatus.SETTLED, 16),
            record('d', 4, TradeStatus.SETTLED, -20),
            record('e', 5, TradeStatus.SETTLED, -20),
            record('f', 6, TradeStatus.SETTLED, 16)
        ]);

        expect(stats).toEqual({
            total: 6,
            wins: 3,
            losses: 3,
            winRate: 50,
            totalPnl: -12,
            profitFactor: 0.8,
            maxConsecutiveWins: 2,
            maxConsecutiveLosses: 3
        });
    });

    it('reports a capped profit factor when nothing was lost', () => {
        expect(calculateTradeStats([record('a', 1, TradeStatus.SETTLED, 16)]).profitFactor).toBe(999);
        expect(calculateTradeStats([]).profitFactor).toBe(0);
    });
});

describe('InMemoryTradeRepository', () => {
    it('finds open trades and excludes finished ones', async () => {
        const repo = new InMemoryTradeRepository();
        await repo.save(record('p', 1, TradeStatus.PENDING));
        await repo.save(record('a', 2, TradeStatus.ACTIVE));
        await repo.save(record('s', 3, TradeStatus.SETTLED, 16));
        await repo.save(record('x', 4, TradeStatus.EXPIRED_UNKNOWN));

        expect((await repo.findOpen()).map(r => r.tradeId)).toEqual(['p', 'a']);
    });

    it('updates an existing record and refuses unknown or duplicate ids', async () => {
        const repo = new InMemoryTradeRepository();
        await repo.save(record('a', 1, TradeStatus.ACTIVE));

        await repo.update(record('a', 1, TradeStatus.SETTLED, -20));
        await expect(repo.update(record('b', 1, TradeStatus.SETTLED, -20))).rejects.toThrow('Trade b not found');
        await expect(repo.save(record('a', 1, TradeStatus.ACTIVE))).rejects.toThrow('Trade a already exists');

        expect(await repo.getStats()).toEqual(expect.objectContaining({ total: 1, losses: 1, totalPnl: -20 }));
    });

    it('returns the newest trades first', async () => {
        const repo = new InMemoryTradeRepository();
        await repo.save(record('old', 1, TradeStatus.SETTLED, 16));
        await repo.save(record('new', 3, TradeStatus.SETTLED, 16));
        await repo.save(record('mid', 2, TradeStatus.SETTLED, 16));

        expect((await repo.getHistory(2)).map(r => r.tradeId)).toEqual(['new', 'mid']);
    });
});

describe('InMemoryLedgerStore', () => {
    it('returns null until a snapshot is saved, then a copy of it', async () => {
        const store = new InMemoryLedgerStore();
        expect(await store.load()).toBeNull();

        const snapshot = new Ledger(1000, new Date('2026-03-02T10:00:00Z')).snapshot();
        await store.save(snapshot);

        const loaded = await store.load();
        expect(loaded).toEqual(snapshot);
        expect(loaded).not.toBe(snapshot);
    });
});
