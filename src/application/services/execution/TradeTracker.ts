import { injectable } from 'inversify';
import { TradeLifecycle, TradeRecord } from '../../../domain/entities/TradeLifecycle';
import { TradeStatus } from '../../../domain/enums/TradeStatus';
import { ContractOutcome } from '../../../domain/interfaces/IExecutionPort';
import { InvariantViolationError } from '../../../domain/errors/AppErrors';

export interface OutcomeObservation {
    tradeId: string;
    outcome: ContractOutcome;
}

export type LifecycleAction =
    | { type: 'activate' }
    | { type: 'settle'; result: number }
    | { type: 'reject'; reason: string }
    | { type: 'expire'; reason: string };

export interface PlannedChange {
    tradeId: string;
    actions: LifecycleAction[];
}

export interface CommittedChange {
    record: TradeRecord;
    /** Terminal action reached by this change, if any. */
    terminal: LifecycleAction | null;
}

/**
 * Owns every lifecycle from submission until it is final.
 *
 * Reconciliation is split in two: `plan` validates observations against the
 * current states without mutating anything, `commit` applies a validated plan.
 * A finalized trade id is never accepted again.
 */
@injectable()
export class TradeTracker {
    private open: Map<string, TradeLifecycle> = new Map();
    private finalizedIds: Set<string> = new Set();

    register(lifecycle: TradeLifecycle): void {
        if (this.open.has(lifecycle.tradeId) || this.finalizedIds.has(lifecycle.tradeId)) {
            throw new InvariantViolationError(`Trade id ${lifecycle.tradeId} is already tracked`, {
                tradeId: lifecycle.tradeId
            });
        }
        this.open.set(lifecycle.tradeId, lifecycle);
    }

    /** Re-tracks open trades found in storage after a restart. */
    restore(records: TradeRecord[]): number {
        let restored = 0;
        for (const record of records) {
            if (this.open.has(record.tradeId) || this.finalizedIds.has(record.tradeId)) continue;
            this.open.set(record.tradeId, TradeLifecycle.fromRecord(record));
            restored++;
        }
        return restored;
    }

    getOpen(): TradeLifecycle[] {
        return [...this.open.values()];
    }

    get(tradeId: string): TradeLifecycle | undefined {
        return this.open.get(tradeId);
    }

    isFinalized(tradeId: string): boolean {
        return this.finalizedIds.has(tradeId);
    }

    /**
     * Works out the transitions implied by the observations and by elapsed time.
     * Open trades without an observation are only checked against their deadline.
     */
    plan(observations: OutcomeObservation[], now: number, graceMs: number): PlannedChange[] {
        const byId = new Map<string, ContractOutcome>();
        for (const obs of observations) {
            if (this.finalizedIds.has(obs.tradeId)) {
                throw new InvariantViolationError(`Attempted to finalize trade ${obs.tradeId} twice`, {
                    tradeId: obs.tradeId,
                    outcome: obs.outcome
                });
            }
            if (!this.open.has(obs.tradeId)) {
                throw new InvariantViolationError(`Outcome received for unknown trade ${obs.tradeId}`, {
                    tradeId: obs.tradeId
                });
            }
            byId.set(obs.tradeId, obs.outcome);
        }

        const changes: PlannedChange[] = [];
        for (const lifecycle of this.open.values()) {
            const actions = planActions(lifecycle, byId.get(lifecycle.tradeId), now, graceMs);
            if (actions.length > 0) {
                changes.push({ tradeId: lifecycle.tradeId, actions });
            }
        }
        return changes;
    }

    commit(change: PlannedChange, now: number): CommittedChange {
        const lifecycle = this.open.get(change.tradeId);
        if (!lifecycle) {
            throw new InvariantViolationError(`Trade ${change.tradeId} is not open`, { tradeId: change.tradeId });
        }

        let terminal: LifecycleAction | null = null;
        for (const action of change.actions) {
            switch (action.type) {
                case 'activate':
                    lifecycle.activate(now);
                    break;
                case 'settle':
                    lifecycle.settle(action.result, now);
                    terminal = action;
                    break;
                case 'reject':
                    lifecycle.reject(action.reason, now);
                    terminal = action;
                    break;
                case 'expire':
                    lifecycle.expireUnknown(now, action.reason);
                    terminal = action;
                    break;
            }
        }

        const record = lifecycle.toRecord();
        if (lifecycle.isTerminal()) {
            this.open.delete(change.tradeId);
            this.finalizedIds.add(change.tradeId);
        }
        return { record, terminal };
    }
}

function planActions(
    lifecycle: TradeLifecycle,
    outcome: ContractOutcome | undefined,
    now: number,
    graceMs: number
): LifecycleAction[] {
    const status = lifecycle.getStatus();
    const pastDeadline = now > lifecycle.deadline(graceMs);
    const expire: LifecycleAction = { type: 'expire', reason: 'no outcome before expiry + grace' };

    if (!outcome) {
        return pastDeadline ? [expire] : [];
    }

    switch (outcome.status) {
        case 'SETTLED':
            if (!Number.isFinite(outcome.profit)) {
                throw new InvariantViolationError(`Trade ${lifecycle.tradeId} settled with a non-finite result`, {
                    tradeId: lifecycle.tradeId,
                    profit: outcome.profit
                });
            }
            if (status === TradeStatus.PENDING) {
                return [{ type: 'activate' }, { type: 'settle', result: outcome.profit }];
            }
            return [{ type: 'settle', result: outcome.profit }];

        case 'REJECTED':
            if (status === TradeStatus.PENDING) {
                return [{ type: 'reject', reason: outcome.reason }];
            }
            // Capital was already committed; the true outcome has to be reconciled by hand.
            return [{ type: 'expire', reason: `venue reported rejection after acknowledgment: ${outcome.reason}` }];

        case 'ACTIVE': {
            const actions: LifecycleAction[] = status === TradeStatus.PENDING ? [{ type: 'activate' }] : [];
            if (pastDeadline) actions.push(expire);
            return actions;
        }

        case 'PENDING':
            return pastDeadline ? [expire] : [];
    }
}
