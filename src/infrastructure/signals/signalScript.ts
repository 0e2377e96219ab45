import { readFileSync } from 'fs';
import { TradeDirection } from '../../domain/enums/TradeDirection';
import { ConfigurationError, toError } from '../../domain/errors/AppErrors';

export interface ScriptedSignal {
    direction: TradeDirection;
    confidence: number;
    expirySeconds: number;
    reason?: string;
}

/**
 * Per-instrument sequence of ticks. A `null` entry means no signal on that tick.
 */
export type SignalScript = Record<string, Array<ScriptedSignal | null>>;

export function loadSignalScript(path: string): SignalScript {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Cannot read signals file ${path}`, toError(error));
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`Signals file ${path} is not valid JSON`, toError(error));
    }
    return parseSignalScript(parsed);
}

export function parseSignalScript(data: unknown): SignalScript {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        throw new ConfigurationError('Signal script must map instruments to arrays of signals');
    }

    const problems: string[] = [];
    const script: SignalScript = {};

    for (const [instrument, entries] of Object.entries(data)) {
        if (!Array.isArray(entries)) {
            problems.push(`${instrument} must be an array`);
            continue;
        }

        script[instrument] = [];
        entries.forEach((entry: unknown, index) => {
            if (entry === null) {
                script[instrument].push(null);
                return;
            }
            const signal = toScriptedSignal(entry);
            if (signal) {
                script[instrument].push(signal);
            } else {
                problems.push(`${instrument}[${index}] needs direction (CALL/PUT), confidence and expirySeconds`);
            }
        });
    }

    if (problems.length > 0) {
        throw new ConfigurationError(`Invalid signal script:\n  - ${problems.join('\n  - ')}`);
    }
    return script;
}

function toScriptedSignal(entry: unknown): ScriptedSignal | null {
    if (typeof entry !== 'object' || entry === null) return null;
    if (!('direction' in entry) || !isDirection(entry.direction)) return null;
    if (!('confidence' in entry) || typeof entry.confidence !== 'number') return null;
    if (!('expirySeconds' in entry) || typeof entry.expirySeconds !== 'number') return null;

    const reason = 'reason' in entry && typeof entry.reason === 'string' ? entry.reason : undefined;
    return {
        direction: entry.direction,
        confidence: entry.confidence,
        expirySeconds: entry.expirySeconds,
        reason
    };
}

function isDirection(value: unknown): value is TradeDirection {
    return value === TradeDirection.CALL || value === TradeDirection.PUT;
}
