import * as dotenv from 'dotenv';
import * as path from 'path';

// Load environment variables
dotenv.config({
    path: path.resolve(process.cwd(), process.env.NODE_ENV === 'production' ? '.env.production' : '.env'),
});

const env = process.env.NODE_ENV || 'development';

export const config = {
    env,
    logging: {
        level: process.env.LOG_LEVEL || 'info',
        filePath: process.env.LOG_FILE_PATH || './logs',
        // Off under test unless LOG_TO_FILE says otherwise
        toFile: process.env.LOG_TO_FILE ? process.env.LOG_TO_FILE === 'true' : env !== 'test',
    },
    mongodb: {
        uri: env === 'production' ? process.env.MONGODB_URI_PROD || process.env.MONGODB_URI : process.env.MONGODB_URI,
        maxPoolSize: parseInt(process.env.MONGODB_MAX_POOL_SIZE || '10', 10),
        serverSelectionTimeoutMS: parseInt(process.env.MONGODB_SERVER_SELECTION_TIMEOUT_MS || '5000', 10),
        socketTimeoutMS: parseInt(process.env.MONGODB_SOCKET_TIMEOUT_MS || '45000', 10),
    },
    sentry: {
        dsn: process.env.SENTRY_DSN,
        environment: process.env.SENTRY_ENVIRONMENT || env,
        release: process.env.SENTRY_RELEASE || process.env.npm_package_version,
        sampleRate: parseFloat(process.env.SENTRY_SAMPLE_RATE || '1.0'),
        debug: process.env.SENTRY_DEBUG === 'true',
        serverName: process.env.SENTRY_SERVER_NAME || 'llm-usage-optimizer',
    },
};
