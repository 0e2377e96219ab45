export enum TickEventKind {
    NO_SIGNAL = 'NO_SIGNAL',
    DENIED = 'DENIED',
    SUBMITTED = 'SUBMITTED',
    REJECTED = 'REJECTED',
    SETTLED = 'SETTLED',
    EXPIRED_UNKNOWN = 'EXPIRED_UNKNOWN',
    ABORTED = 'ABORTED',
    HALTED = 'HALTED'
}
