import Redis from 'ioredis';
import { logger, describeError } from './logger';
import { Settings } from './settings';

export const createRedis = (settings: Settings['redis']): Redis => {
    const options = {
        maxRetriesPerRequest: 3,
        lazyConnect: true
    };

    const redis = settings.url
        ? new Redis(settings.url, options)
        : new Redis({
            ...options,
            host: settings.host,
            port: settings.port,
            password: settings.password
        });

    redis.on('connect', () => {
        logger.info('Redis connected successfully');
    });

    redis.on('error', (error: Error) => {
        logger.error('Redis connection error', { error: error.message });
    });

    redis.on('ready', () => {
        logger.info('Redis ready for commands');
    });

    return redis;
};

export const setCache = async (redis: Redis, key: string, value: unknown, ttlSeconds: number = 300): Promise<void> => {
    try {
        await redis.setex(key, ttlSeconds, JSON.stringify(value));
    } catch (error) {
        logger.error('Error setting cache', { error: describeError(error), key });
    }
};

export const getCache = async (redis: Redis, key: string): Promise<unknown> => {
    try {
        const result = await redis.get(key);
        return result ? JSON.parse(result) : null;
    } catch (error) {
        logger.error('Error getting cache', { error: describeError(error), key });
        return null;
    }
};

export const testRedisConnection = async (redis: Redis): Promise<boolean> => {
    try {
        await redis.ping();
        logger.info('Redis connection test successful');
        return true;
    } catch (error) {
        logger.error('Redis connection test failed', { error: describeError(error) });
        return false;
    }
};
