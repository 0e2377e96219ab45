import { TradeTracker } from '../../../../src/application/services/execution/TradeTracker';
import { TradeLifecycle } from '../../../../src/domain/entities/TradeLifecycle';
import { TradeDirection } from '../../../../src/domain/enums/TradeDirection';
import { TradeStatus } from '../../../../src/domain/enums/TradeStatus';
import { InvariantViolationError } from '../../../../src/domain/errors/AppErrors';

const T0 = Date.parse('2026-03-02T10:00:00Z');
const GRACE = 60_000;

function track(tracker: TradeTracker, tradeId: string): TradeLifecycle {
    const lifecycle = new TradeLifecycle(tradeId, 'R_100', TradeDirection.PUT, 20, 60_000, T0);
    tracker.register(lifecycle);
    return lifecycle;
}

describe('TradeTracker', () => {
    it('activates then settles a PENDING trade reported as settled', () => {
        const tracker = new TradeTracker();
        track(tracker, 't1');

        const plan = tracker.plan([{ tradeId: 't1', outcome: { status: 'SETTLED', profit: 16 } }], T0 + 61_000, GRACE);
        expect(plan).toEqual([
            { tradeId: 't1', actions: [{ type: 'activate' }, { type: 'settle', result: 16 }] }
        ]);

        const committed = tracker.commit(plan[0], T0 + 61_000);
        expect(committed.terminal).toEqual({ type: 'settle', result: 16 });
        expect(committed.record.status).toBe(TradeStatus.SETTLED);
        expect(tracker.getOpen()).toEqual([]);
        expect(tracker.isFinalized('t1')).toBe(true);
        expect(tracker.get('t1')).toBeUndefined();
    });

    it('does not mutate anything while planning', () => {
        const tracker = new TradeTracker();
        const lifecycle = track(tracker, 't1');

        tracker.plan([{ tradeId: 't1', outcome: { status: 'ACTIVE' } }], T0, GRACE);

        expect(lifecycle.getStatus()).toBe(TradeStatus.PENDING);
    });

    it('refuses an outcome for a trade that is already final', () => {
        const tracker = new TradeTracker();
        track(tracker, 't1');
        const [change] = tracker.plan([{ tradeId: 't1', outcome: { status: 'SETTLED', profit: -20 } }], T0, GRACE);
        tracker.commit(change, T0);

        expect(() => tracker.plan([{ tradeId: 't1', outcome: { status: 'SETTLED', profit: -20 } }], T0, GRACE))
            .toThrow('Attempted to finalize trade t1 twice');
    });

    it('refuses an outcome for an unknown trade', () => {
        const tracker = new TradeTracker();

        expect(() => tracker.plan([{ tradeId: 'ghost', outcome: { status: 'ACTIVE' } }], T0, GRACE))
            .toThrow('Outcome received for unknown trade ghost');
    });

    it('refuses to register the same id twice', () => {
        const tracker = new TradeTracker();
        track(tracker, 't1');

        expect(() => track(tracker, 't1')).toThrow(InvariantViolationError);
    });

    it('expires an active trade once expiry plus grace has passed', () => {
        const tracker = new TradeTracker();
        const lifecycle = track(tracker, 't1');
        lifecycle.activate(T0);

        expect(tracker.plan([{ tradeId: 't1', outcome: { status: 'ACTIVE' } }], T0 + 120_000, GRACE)).toEqual([]);
        expect(tracker.plan([{ tradeId: 't1', outcome: { status: 'ACTIVE' } }], T0 + 120_001, GRACE)).toEqual([
            { tradeId: 't1', actions: [{ type: 'expire', reason: 'no outcome before expiry + grace' }] }
        ]);
    });

    it('rejects a pending trade the venue refused', () => {
        const tracker = new TradeTracker();
        track(tracker, 't1');

        const [change] = tracker.plan([{ tradeId: 't1', outcome: { status: 'REJECTED', reason: 'market closed' } }], T0, GRACE);
        const { record, terminal } = tracker.commit(change, T0);

        expect(terminal).toEqual({ type: 'reject', reason: 'market closed' });
        expect(record.status).toBe(TradeStatus.REJECTED);
        expect(record.reason).toBe('market closed');
    });

    it('hands an acknowledged trade later reported as rejected to manual reconciliation', () => {
        const tracker = new TradeTracker();
        track(tracker, 't1').activate(T0);

        const [change] = tracker.plan([{ tradeId: 't1', outcome: { status: 'REJECTED', reason: 'voided' } }], T0, GRACE);

        expect(change.actions).toEqual([
            { type: 'expire', reason: 'venue reported rejection after acknowledgment: voided' }
        ]);
    });

    it('throws on a non-finite settlement before anything changes', () => {
        const tracker = new TradeTracker();
        const lifecycle = track(tracker, 't1');

        expect(() => tracker.plan([{ tradeId: 't1', outcome: { status: 'SETTLED', profit: Number.NaN } }], T0, GRACE))
            .toThrow(InvariantViolationError);
        expect(lifecycle.getStatus()).toBe(TradeStatus.PENDING);
    });

    it('restores open records and skips ids it already knows', () => {
        const tracker = new TradeTracker();
        track(tracker, 't1');
        const stored = new TradeLifecycle('t2', 'R_50', TradeDirection.CALL, 10, 60_000, T0);
        stored.activate(T0);

        expect(tracker.restore([stored.toRecord(), tracker.getOpen()[0].toRecord()])).toBe(1);
        expect(tracker.get('t2')?.getStatus()).toBe(TradeStatus.ACTIVE);
    });
});
