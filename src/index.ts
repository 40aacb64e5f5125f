import { createApp } from './app';
import { createContainer } from './container';
import { logger } from './config/logger';
import { loadSettings } from './config/settings';

const settings = loadSettings();
const container = createContainer(settings);
const app = createApp(container);

const server = app.listen(settings.port, () => {
    logger.info(`Fraud Fusion API running on port ${settings.port}`);
    logger.info(`Health check: http://localhost:${settings.port}/health`);
    logger.info(`API Base URL: http://localhost:${settings.port}/api`);

    container.checkConnections()
        .then(ok => {
            if (!ok) {
                logger.warn('Some backing stores are unreachable; history and caching will report errors');
            }
        })
        .catch((error: unknown) => logger.error('Connection check failed', { error }));
});

const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} signal received: closing HTTP server`);

    server.close(() => {
        logger.info('HTTP server closed');
        container.shutdown()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Shutdown failed', { error });
                process.exit(1);
            });
    });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
