import Redis from 'ioredis';
import { logger } from './logger';
import { Settings } from './settings';

export const createRedisClient = (config: Settings['redis']): Redis => {
    const redis = new Redis({
        host: config.host,
        port: config.port,
        password: config.password,
        maxRetriesPerRequest: 3,
        lazyConnect: true
    });

    redis.on('connect', () => {
        logger.info('Redis connected successfully', { host: config.host, port: config.port });
    });

    redis.on('error', (error: Error) => {
        logger.error('Redis connection error', { error: error.message });
    });

    redis.on('ready', () => {
        logger.info('Redis ready for commands');
    });

    return redis;
};
