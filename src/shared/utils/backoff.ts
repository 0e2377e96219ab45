/** Exponential backoff delay for a zero-based attempt number, capped at maxMs. */
export function computeBackoff(attempt: number, baseMs: number, maxMs: number): number {
    return Math.min(maxMs, baseMs * 2 ** attempt);
}
