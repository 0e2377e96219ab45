import { DEFAULT_TRADING_CONFIG, NewsBlackout, TradingConfig, TradingMode } from './trading.config';
import { ConfigurationError } from '../domain/errors/AppErrors';
import { parseLogLevel } from '../shared/logger/Logger';

type Env = Record<string, string | undefined>;

/**
 * Builds the runtime configuration from environment variables layered over
 * DEFAULT_TRADING_CONFIG. Throws ConfigurationError listing every problem found.
 */
export function loadConfig(env: Env = process.env): TradingConfig {
    const problems: string[] = [];
    const read = (key: string): string | undefined => {
        const raw = env[key];
        return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
    };

    const num = (key: string, fallback: number): number => {
        const raw = read(key);
        if (raw === undefined) return fallback;
        const parsed = Number(raw);
        if (!Number.isFinite(parsed)) {
            problems.push(`${key} must be a number, got "${raw}"`);
            return fallback;
        }
        return parsed;
    };

    const defaults = DEFAULT_TRADING_CONFIG;

    const modeRaw = read('TRADING_MODE') ?? defaults.mode;
    let mode: TradingMode = defaults.mode;
    if (modeRaw === 'paper' || modeRaw === 'live') {
        mode = modeRaw;
    } else {
        problems.push(`TRADING_MODE must be "paper" or "live", got "${modeRaw}"`);
    }

    const instrumentsRaw = read('INSTRUMENTS');
    const instruments = instrumentsRaw
        ? instrumentsRaw.split(',').map(s => s.trim()).filter(s => s.length > 0)
        : [...defaults.instruments];

    const logLevelRaw = read('LOG_LEVEL');
    let logLevel = defaults.logLevel;
    if (logLevelRaw !== undefined) {
        const parsed = parseLogLevel(logLevelRaw);
        if (parsed) {
            logLevel = parsed;
        } else {
            problems.push(`LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR, got "${logLevelRaw}"`);
        }
    }

    const config: TradingConfig = {
        mode,
        initialBalance: num('INITIAL_BALANCE', defaults.initialBalance),
        instruments,
        risk: {
            maxDailyLoss: num('MAX_DAILY_LOSS', defaults.risk.maxDailyLoss),
            maxDailyTrades: num('MAX_DAILY_TRADES', defaults.risk.maxDailyTrades),
            maxConsecutiveLosses: num('MAX_CONSECUTIVE_LOSSES', defaults.risk.maxConsecutiveLosses),
            maxDrawdownPercent: num('MAX_DRAWDOWN_PERCENT', defaults.risk.maxDrawdownPercent),
            minBalance: num('MIN_BALANCE', defaults.risk.minBalance),
            baseStakePercent: num('BASE_STAKE_PERCENT', defaults.risk.baseStakePercent),
            maxStakePercent: num('MAX_STAKE_PERCENT', defaults.risk.maxStakePercent),
            minStake: num('MIN_STAKE', defaults.risk.minStake),
            maxStake: num('MAX_STAKE', defaults.risk.maxStake),
            currencyIncrement: num('CURRENCY_INCREMENT', defaults.risk.currencyIncrement)
        },
        tickIntervalMs: num('TICK_INTERVAL_MS', defaults.tickIntervalMs),
        tickTimeoutMs: num('TICK_TIMEOUT_MS', defaults.tickTimeoutMs),
        expiryGraceMs: num('EXPIRY_GRACE_MS', defaults.expiryGraceMs),
        maxConnectionFailures: num('MAX_CONNECTION_FAILURES', defaults.maxConnectionFailures),
        venue: {
            appId: read('DERIV_APP_ID') ?? defaults.venue.appId,
            apiToken: read('DERIV_API_TOKEN'),
            url: read('DERIV_WS_URL') ?? defaults.venue.url,
            currency: read('DERIV_CURRENCY') ?? defaults.venue.currency,
            reconnectBaseMs: num('RECONNECT_BASE_MS', defaults.venue.reconnectBaseMs),
            reconnectMaxMs: num('RECONNECT_MAX_MS', defaults.venue.reconnectMaxMs),
            maxReconnectAttempts: num('MAX_RECONNECT_ATTEMPTS', defaults.venue.maxReconnectAttempts)
        },
        paper: {
            payoutRatio: num('PAPER_PAYOUT_RATIO', defaults.paper.payoutRatio),
            winProbability: num('PAPER_WIN_PROBABILITY', defaults.paper.winProbability)
        },
        signalsFile: read('SIGNALS_FILE') ?? defaults.signalsFile,
        mongoUri: read('MONGO_URI'),
        newsBlackouts: parseBlackouts(read('NEWS_BLACKOUTS'), problems),
        alerts: {
            drawdownPercent: num('ALERT_DRAWDOWN_PERCENT', defaults.alerts.drawdownPercent),
            consecutiveLosses: num('ALERT_CONSECUTIVE_LOSSES', defaults.alerts.consecutiveLosses),
            largeLossAmount: num('ALERT_LARGE_LOSS', defaults.alerts.largeLossAmount)
        },
        logLevel
    };

    problems.push(...validateConfig(config));

    if (problems.length > 0) {
        throw new ConfigurationError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    }

    return config;
}

/**
 * Checks the cross-field rules a config must satisfy before trading starts.
 */
export function validateConfig(config: TradingConfig): string[] {
    const problems: string[] = [];
    const { risk } = config;

    if (config.initialBalance <= 0) problems.push('initialBalance must be positive');
    if (config.instruments.length === 0) problems.push('at least one instrument is required');

    if (risk.maxDailyLoss <= 0) problems.push('maxDailyLoss must be positive');
    if (!Number.isInteger(risk.maxDailyTrades) || risk.maxDailyTrades < 1) {
        problems.push('maxDailyTrades must be a positive integer');
    }
    if (!Number.isInteger(risk.maxConsecutiveLosses) || risk.maxConsecutiveLosses < 1) {
        problems.push('maxConsecutiveLosses must be a positive integer');
    }
    if (risk.maxDrawdownPercent <= 0 || risk.maxDrawdownPercent > 100) {
        problems.push('maxDrawdownPercent must be within (0, 100]');
    }
    if (risk.minBalance < 0) problems.push('minBalance must not be negative');
    if (risk.minBalance >= config.initialBalance) problems.push('minBalance must be below initialBalance');
    if (risk.baseStakePercent <= 0 || risk.baseStakePercent > 100) {
        problems.push('baseStakePercent must be within (0, 100]');
    }
    if (risk.maxStakePercent <= 0 || risk.maxStakePercent > 100) {
        problems.push('maxStakePercent must be within (0, 100]');
    }
    if (risk.minStake <= 0) problems.push('minStake must be positive');
    if (risk.maxStake < risk.minStake) problems.push('maxStake must not be below minStake');
    if (risk.currencyIncrement <= 0) problems.push('currencyIncrement must be positive');

    if (config.tickIntervalMs <= 0) problems.push('tickIntervalMs must be positive');
    if (config.tickTimeoutMs <= 0) problems.push('tickTimeoutMs must be positive');
    if (config.expiryGraceMs < 0) problems.push('expiryGraceMs must not be negative');
    if (!Number.isInteger(config.maxConnectionFailures) || config.maxConnectionFailures < 1) {
        problems.push('maxConnectionFailures must be a positive integer');
    }

    if (config.paper.payoutRatio <= 0) problems.push('paper payoutRatio must be positive');
    if (config.paper.winProbability < 0 || config.paper.winProbability > 1) {
        problems.push('paper winProbability must be within [0, 1]');
    }

    if (config.mode === 'live' && !config.venue.appId) {
        problems.push('DERIV_APP_ID is required in live mode');
    }
    if (config.venue.maxReconnectAttempts < 0) problems.push('maxReconnectAttempts must not be negative');

    return problems;
}

function parseBlackouts(raw: string | undefined, problems: string[]): NewsBlackout[] {
    if (raw === undefined) return [...DEFAULT_TRADING_CONFIG.newsBlackouts];

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        problems.push(`NEWS_BLACKOUTS must be a JSON array: ${error instanceof Error ? error.message : String(error)}`);
        return [];
    }

    if (!Array.isArray(parsed)) {
        problems.push('NEWS_BLACKOUTS must be a JSON array');
        return [];
    }

    const blackouts: NewsBlackout[] = [];
    parsed.forEach((entry: unknown, index) => {
        if (
            typeof entry === 'object' && entry !== null &&
            'start' in entry && typeof entry.start === 'string' && !Number.isNaN(Date.parse(entry.start)) &&
            'durationMinutes' in entry && typeof entry.durationMinutes === 'number' && entry.durationMinutes > 0
        ) {
            blackouts.push({ start: entry.start, durationMinutes: entry.durationMinutes });
        } else {
            problems.push(`NEWS_BLACKOUTS[${index}] needs an ISO "start" and a positive "durationMinutes"`);
        }
    });
    return blackouts;
}
