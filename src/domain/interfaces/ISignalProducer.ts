import { CandidateSignal } from '../value-objects/CandidateSignal';

export interface ISignalProducer {
    nextSignal(instrument: string, now: Date): Promise<CandidateSignal | null>;
}
