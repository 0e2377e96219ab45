import { createContainer } from '../../config/inversify.config';
import { TradingConfig } from '../../config/trading.config';
import { TYPES } from '../../config/types';
import { RunTradingSession } from '../../application/use-cases/RunTradingSession';
import { ITradeRepository } from '../../domain/interfaces/ITradeRepository';
import { connectMongo, disconnectMongo } from '../../infrastructure/database/mongoose';
import { Logger } from '../../shared/logger/Logger';

export async function runTradeCommand(config: TradingConfig): Promise<void> {
    const logger = Logger.getInstance();

    if (config.mongoUri) {
        await connectMongo(config.mongoUri);
    } else {
        logger.warn('[CLI] MONGO_URI not set, ledger and trades are kept in memory only');
    }

    const container = createContainer(config);
    const session = container.get<RunTradingSession>(RunTradingSession);
    const tradeRepo = container.get<ITradeRepository>(TYPES.ITradeRepository);

    const shutdown = (signal: string) => {
        logger.info(`[CLI] ${signal} received, stopping after the current tick`);
        session.stop();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    try {
        logger.info(`Starting ${config.mode.toUpperCase()} trading for: ${config.instruments.join(', ')}`);
        await session.start();

        const summary = session.getDailySummary();
        const stats = await tradeRepo.getStats();

        logger.info('=== SESSION SUMMARY ===');
        logger.info(`Date: ${summary.date}`);
        logger.info(`Trades today: ${summary.totalTrades} (${summary.wins}W / ${summary.losses}L)`);
        logger.info(`Net P&L today: ${summary.netResult.toFixed(2)}`);
        logger.info(`Balance: ${summary.balance.toFixed(2)}`);
        logger.info(`All-time: ${stats.total} trades | Win Rate: ${stats.winRate.toFixed(2)}% | P&L: ${stats.totalPnl.toFixed(2)}`);
        if (session.isHalted()) {
            logger.warn('Trading halted by risk limits. Restart the process to resume.');
        }
    } catch (error) {
        logger.error('Trading session failed', error);
        throw error;
    } finally {
        if (config.mongoUri) {
            await disconnectMongo();
        }
    }
}
