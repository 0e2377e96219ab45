/**
 * Default trading configuration.
 *
 * Every value can be overridden from the environment, see loadConfig.ts.
 */

import { RiskLimits } from '../domain/value-objects/RiskLimits';
import { LogLevel } from '../shared/logger/Logger';

export type TradingMode = 'paper' | 'live';

export interface NewsBlackout {
    /** ISO timestamp the blackout starts at. */
    start: string;
    durationMinutes: number;
}

export interface TradingConfig {
    mode: TradingMode;
    initialBalance: number;
    instruments: string[];
    risk: RiskLimits;

    // Scheduling
    tickIntervalMs: number;
    tickTimeoutMs: number;
    expiryGraceMs: number;
    maxConnectionFailures: number;

    venue: {
        appId: string;
        apiToken?: string;
        url: string;
        currency: string;
        reconnectBaseMs: number;
        reconnectMaxMs: number;
        maxReconnectAttempts: number;
    };

    paper: {
        payoutRatio: number;
        winProbability: number;
    };

    /** JSON signal script replayed by the signal producer. */
    signalsFile: string;

    mongoUri?: string;
    newsBlackouts: NewsBlackout[];
    alerts: {
        drawdownPercent: number;
        consecutiveLosses: number;
        largeLossAmount: number;
    };
    logLevel: LogLevel;
}

export const DEFAULT_TRADING_CONFIG: TradingConfig = {
    mode: 'paper',
    initialBalance: 1000,
    instruments: ['R_100'],

    risk: {
        maxDailyLoss: 100,
        maxDailyTrades: 50,
        maxConsecutiveLosses: 5,
        maxDrawdownPercent: 20,
        minBalance: 100,
        baseStakePercent: 2,
        maxStakePercent: 5,
        minStake: 1,
        maxStake: 100,
        currencyIncrement: 0.01
    },

    tickIntervalMs: 30_000,
    tickTimeoutMs: 15_000,
    expiryGraceMs: 60_000,
    maxConnectionFailures: 5,

    venue: {
        appId: '',
        url: 'wss://ws.derivws.com/websockets/v3',
        currency: 'USD',
        reconnectBaseMs: 1_000,
        reconnectMaxMs: 30_000,
        maxReconnectAttempts: 5
    },

    // Deriv pays roughly 80% on rise/fall contracts
    paper: {
        payoutRatio: 0.8,
        winProbability: 0.5
    },

    signalsFile: 'signals/example.json',

    newsBlackouts: [],
    alerts: {
        drawdownPercent: 15,
        consecutiveLosses: 3,
        largeLossAmount: 50
    },
    logLevel: LogLevel.INFO
};
