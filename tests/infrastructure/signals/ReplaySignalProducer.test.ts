import { join } from 'path';
import { ReplaySignalProducer } from '../../../src/infrastructure/signals/ReplaySignalProducer';
import { loadSignalScript, parseSignalScript } from '../../../src/infrastructure/signals/signalScript';
import { ConfigurationError } from '../../../src/domain/errors/AppErrors';
import { TradeDirection } from '../../../src/domain/enums/TradeDirection';

const NOW = new Date('2026-03-02T10:00:00Z');

describe('parseSignalScript', () => {
    it('accepts signals and null entries per instrument', () => {
        expect(parseSignalScript({
            R_100: [{ direction: 'CALL', confidence: 0.7, expirySeconds: 60, reason: 'ema crossover up' }, null]
        })).toEqual({
            R_100: [
                { direction: TradeDirection.CALL, confidence: 0.7, expirySeconds: 60, reason: 'ema crossover up' },
                null
            ]
        });
    });

    it('reports every malformed entry', () => {
        expect(() => parseSignalScript({
            R_100: [{ direction: 'UP', confidence: 0.7, expirySeconds: 60 }],
            R_50: 'CALL'
        })).toThrow(
            'Invalid signal script:\n' +
            '  - R_100[0] needs direction (CALL/PUT), confidence and expirySeconds\n' +
            '  - R_50 must be an array'
        );
    });

    it('rejects a top-level array', () => {
        expect(() => parseSignalScript([])).toThrow(ConfigurationError);
    });
});

describe('loadSignalScript', () => {
    it('loads the bundled example script', () => {
        const script = loadSignalScript(join(__dirname, '../../../signals/example.json'));

        expect(Object.keys(script)).toEqual(['R_100', 'R_50']);
        expect(script.R_100).toHaveLength(8);
    });

    it('fails with ConfigurationError for a missing file', () => {
        expect(() => loadSignalScript(join(__dirname, 'missing.json'))).toThrow(ConfigurationError);
    });
});

describe('ReplaySignalProducer', () => {
    it('replays entries in order per instrument, then runs dry', async () => {
        const producer = new ReplaySignalProducer({
            R_100: [{ direction: TradeDirection.PUT, confidence: 0.66, expirySeconds: 90 }, null],
            R_50: [{ direction: TradeDirection.CALL, confidence: 0.7, expirySeconds: 60 }]
        });

        const first = await producer.nextSignal('R_100', NOW);
        expect(first?.instrument).toBe('R_100');
        expect(first?.direction).toBe(TradeDirection.PUT);
        expect(first?.expiryMs).toBe(90_000);
        expect(first?.createdAt).toBe(NOW.getTime());

        expect(await producer.nextSignal('R_100', NOW)).toBeNull();
        expect(await producer.nextSignal('R_100', NOW)).toBeNull();
        expect(producer.remaining('R_50')).toBe(1);
        expect(await producer.nextSignal('EURUSD', NOW)).toBeNull();
    });

    it('skips a scripted signal that fails validation', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const producer = new ReplaySignalProducer({
            R_100: [{ direction: TradeDirection.CALL, confidence: 1.5, expirySeconds: 60 }]
        });

        expect(await producer.nextSignal('R_100', NOW)).toBeNull();
        jest.restoreAllMocks();
    });
});
