import { TradingConfig } from '../../config/trading.config';
import { TradeRepository } from '../../infrastructure/database/repositories/TradeRepository';
import { connectMongo, disconnectMongo } from '../../infrastructure/database/mongoose';
import { ConfigurationError } from '../../domain/errors/AppErrors';
import { Logger } from '../../shared/logger/Logger';

export async function runStatsCommand(config: TradingConfig, limit = 10): Promise<void> {
    const logger = Logger.getInstance();
    if (!config.mongoUri) {
        throw new ConfigurationError('MONGO_URI is required to read trade history');
    }

    await connectMongo(config.mongoUri);
    try {
        const repo = new TradeRepository();
        const stats = await repo.getStats();

        logger.info('=== TRADE STATISTICS ===');
        logger.info(`Total Trades: ${stats.total} (${stats.wins}W / ${stats.losses}L)`);
        logger.info(`Win Rate: ${stats.winRate.toFixed(2)}%`);
        logger.info(`Total P&L: ${stats.totalPnl.toFixed(2)}`);
        logger.info(`Profit Factor: ${stats.profitFactor.toFixed(2)}`);
        logger.info(`Longest streaks: ${stats.maxConsecutiveWins}W / ${stats.maxConsecutiveLosses}L`);

        const history = await repo.getHistory(limit);
        for (const trade of history) {
            const result = trade.result === null ? '-' : trade.result.toFixed(2);
            logger.info(
                `${new Date(trade.submittedAt).toISOString()} ${trade.tradeId} ${trade.direction} ${trade.instrument} ` +
                `| Stake: ${trade.stake.toFixed(2)} | ${trade.status} | Result: ${result}`
            );
        }
    } finally {
        await disconnectMongo();
    }
}
