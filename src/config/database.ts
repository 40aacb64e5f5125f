import { Pool, PoolConfig } from 'pg';
import { logger, describeError } from './logger';
import { Settings } from './settings';

export const createPool = (settings: Settings['database']): Pool => {
    const dbConfig: PoolConfig = settings.connectionString
        ? { connectionString: settings.connectionString }
        : {
            host: settings.host,
            port: settings.port,
            database: settings.database,
            user: settings.user,
            password: settings.password
        };

    const pool = new Pool({
        ...dbConfig,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000
    });

    pool.on('connect', () => {
        logger.info('New PostgreSQL client connected');
    });

    pool.on('error', (err) => {
        logger.error('PostgreSQL client error', { error: err.message });
    });

    return pool;
};

export const testConnection = async (pool: Pool): Promise<boolean> => {
    try {
        const client = await pool.connect();
        const result = await client.query('SELECT NOW()');

        client.release();

        logger.info('Database connection successful', result.rows[0]);
        return true;
    } catch (error) {
        logger.error('Database connection failed', { error: describeError(error) });
        return false;
    }
};
