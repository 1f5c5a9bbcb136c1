import mongoose from 'mongoose';
import { config } from './env';
import { loggingService } from '../services/logging.service';

export const connectDatabase = async (uri: string | undefined = config.mongodb.uri): Promise<void> => {
    if (!uri) {
        throw new Error('Missing required environment variable: MONGODB_URI');
    }

    try {
        await mongoose.connect(uri, {
            autoIndex: true,
            maxPoolSize: config.mongodb.maxPoolSize,
            serverSelectionTimeoutMS: config.mongodb.serverSelectionTimeoutMS,
            socketTimeoutMS: config.mongodb.socketTimeoutMS,
        });

        loggingService.info('MongoDB connected successfully', {
            component: 'DatabaseConfig',
            operation: 'connectDatabase',
            type: 'database'
        });

        mongoose.connection.on('error', (err: Error) => {
            loggingService.logError(err, {
                component: 'DatabaseConfig',
                operation: 'connectDatabase',
                type: 'database',
                event: 'connection_error'
            });
        });

        mongoose.connection.on('disconnected', () => {
            loggingService.warn('MongoDB disconnected', {
                component: 'DatabaseConfig',
                operation: 'connectDatabase',
                type: 'database',
                event: 'disconnected'
            });
        });
    } catch (error) {
        loggingService.logError(error instanceof Error ? error : new Error(String(error)), {
            component: 'DatabaseConfig',
            operation: 'connectDatabase',
            type: 'database',
            event: 'connection_failed'
        });
        throw error;
    }
};

export const disconnectDatabase = async (): Promise<void> => {
    await mongoose.connection.close();
    loggingService.info('MongoDB connection closed', {
        component: 'DatabaseConfig',
        operation: 'disconnectDatabase',
        type: 'database',
        event: 'manual_disconnect'
    });
};
