import Redis from 'ioredis';
import { config } from '@/config';
import logger from '@/utils/pinoLogger';

/**
 * Blocking stream reads hold their connection, so every consumer gets its
 * own client from here instead of sharing one.
 */
export function createRedisClient(name : string) : Redis {
    const client = new Redis(config.REDIS_URL, {
        lazyConnect : true,
        connectionName : `${config.PODNAME}:${name}`,
        maxRetriesPerRequest : 3,
        retryStrategy : (attempt) => Math.min(attempt * 500, 5000),
    });

    client.on('error', (error) => {
        logger.error(`Redis client ${name} error`, { errorMessage : error.message });
    });
    client.on('ready', () => {
        logger.info(`Redis client ${name} ready`);
    });

    return client;
}
