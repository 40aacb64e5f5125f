import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './config/logger';
import { AppContainer } from './container';
import { errorHandler } from './middleware/errorHandler';
import { createRoutes } from './routes';
import { HealthCheckResponse } from './types/api';

export const createApp = (container: AppContainer): Express => {
    const app = express();

    app.use(helmet({
        contentSecurityPolicy: false
    }));

    app.use(cors({
        origin: container.settings.nodeEnv === 'production' ? false : true,
        credentials: true
    }));

    app.use(express.json({ limit: '10mb' }));
    app.use(express.urlencoded({ extended: true }));

    app.use((req, res, next) => {
        logger.info(`${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.get('User-Agent')
        });
        next();
    });

    app.get('/health', (req, res) => {
        const services = container.fraudDetection.collaboratorModes();
        const degraded = Object.values(services).some(mode => mode === 'degraded');

        const health: HealthCheckResponse = {
            status: degraded ? 'DEGRADED' : 'OK',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            version: container.settings.version,
            services
        };
        res.json(health);
    });

    app.use('/api', createRoutes(container));

    app.use('*', (req, res) => {
        res.status(404).json({
            success: false,
            error: 'Endpoint not found',
            path: req.originalUrl,
            method: req.method
        });
    });

    app.use(errorHandler);

    return app;
};
