/** UTC calendar day of a timestamp, formatted YYYY-MM-DD. */
export function toSessionDate(date: Date): string {
    return date.toISOString().substring(0, 10);
}

export function formatTimestamp(date: Date): string {
    return date.toISOString().replace('T', ' ').substring(0, 19);
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export type Sleep = (ms: number) => Promise<void>;

/**
 * Races a promise against a deadline given as an epoch millisecond timestamp.
 * The timer is always cleared, and a late rejection of `promise` stays handled.
 */
export async function withDeadline<T>(promise: Promise<T>, deadline: number, onTimeout: () => Error): Promise<T> {
    const remaining = Math.max(0, deadline - Date.now());

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), remaining);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
