import mongoose from 'mongoose';
import { ConnectionError } from '../../domain/errors/AppErrors';
import { Logger } from '../../shared/logger/Logger';

export async function connectMongo(uri: string): Promise<void> {
    const logger = Logger.getInstance();
    try {
        await mongoose.connect(uri, { serverSelectionTimeoutMS: 10_000 });
        logger.info('[DB] Connected to MongoDB');
    } catch (error) {
        throw new ConnectionError(
            'Failed to connect to MongoDB',
            error instanceof Error ? error : undefined
        );
    }
}

export async function disconnectMongo(): Promise<void> {
    await mongoose.disconnect();
    Logger.getInstance().info('[DB] Disconnected from MongoDB');
}
