import { injectable, inject } from 'inversify';
import { ISignalProducer } from '../../domain/interfaces/ISignalProducer';
import { CandidateSignal } from '../../domain/value-objects/CandidateSignal';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';
import { ScriptedSignal, SignalScript } from './signalScript';

/**
 * Replays a signal script, one entry per request per instrument.
 * An instrument whose entries are used up yields no more signals.
 */
@injectable()
export class ReplaySignalProducer implements ISignalProducer {
    private logger = Logger.getInstance();
    private queues: Map<string, Array<ScriptedSignal | null>> = new Map();

    constructor(@inject(TYPES.SignalScript) script: SignalScript) {
        for (const [instrument, entries] of Object.entries(script)) {
            this.queues.set(instrument, [...entries]);
        }
    }

    async nextSignal(instrument: string, now: Date): Promise<CandidateSignal | null> {
        const entry = this.queues.get(instrument)?.shift();
        if (!entry) return null;

        try {
            return CandidateSignal.create({
                instrument,
                direction: entry.direction,
                confidence: entry.confidence,
                expiryMs: entry.expirySeconds * 1000,
                createdAt: now.getTime(),
                reason: entry.reason
            });
        } catch (error) {
            this.logger.warn(
                `[SIGNALS] Discarding scripted signal for ${instrument}`,
                error instanceof Error ? error.message : error
            );
            return null;
        }
    }

    remaining(instrument: string): number {
        return this.queues.get(instrument)?.length ?? 0;
    }
}
