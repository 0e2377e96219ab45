import { TradeDirection } from '../enums/TradeDirection';

export interface CandidateSignalProps {
    instrument: string;
    direction: TradeDirection;
    confidence: number;
    expiryMs: number;
    createdAt: number;
    reason?: string;
}

/**
 * Directional opportunity handed in by the signal producer.
 */
export class CandidateSignal {
    private constructor(
        public readonly instrument: string,
        public readonly direction: TradeDirection,
        public readonly confidence: number,
        public readonly expiryMs: number,
        public readonly createdAt: number,
        public readonly reason?: string
    ) {}

    static create(props: CandidateSignalProps): CandidateSignal {
        if (!props.instrument) {
            throw new RangeError('Signal instrument is required');
        }
        if (!Number.isFinite(props.confidence) || props.confidence < 0 || props.confidence > 1) {
            throw new RangeError(`Signal confidence must be within [0, 1], got ${props.confidence}`);
        }
        if (!Number.isFinite(props.expiryMs) || props.expiryMs <= 0) {
            throw new RangeError(`Signal expiry must be positive, got ${props.expiryMs}`);
        }

        return Object.freeze(new CandidateSignal(
            props.instrument,
            props.direction,
            props.confidence,
            props.expiryMs,
            props.createdAt,
            props.reason
        ));
    }
}
