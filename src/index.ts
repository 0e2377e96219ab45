#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { loadConfig } from './config/loadConfig';
import { runTradeCommand } from './presentation/cli/TradeCommand';
import { runStatsCommand } from './presentation/cli/StatsCommand';
import { ConfigurationError } from './domain/errors/AppErrors';
import { Logger } from './shared/logger/Logger';

async function main() {
    const logger = Logger.getInstance();
    const args = process.argv.slice(2);
    const command = args[0] ?? 'trade'; // 'trade' or 'stats'

    try {
        const config = loadConfig();
        logger.setLogLevel(config.logLevel);

        if (command === 'stats') {
            const limit = parseInt(args[1] ?? '', 10) || 10;
            await runStatsCommand(config, limit);
        } else if (command === 'trade') {
            await runTradeCommand(config);
        } else {
            logger.error(`Unknown command "${command}". Usage: index.js [trade|stats [limit]]`);
            process.exitCode = 1;
        }
    } catch (error) {
        if (error instanceof ConfigurationError) {
            logger.error(error.message);
        } else {
            logger.error('Application crashed', error);
        }
        process.exit(1);
    }
}

main().catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
});
