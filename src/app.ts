import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './config/logger';
import { errorHandler } from './middleware/errorHandler';
import { createRoutes, type RouteDeps } from './routes';
import type { HealthCheckResponse } from './types/api';

export const createApp = (deps: RouteDeps): Express => {
    const app = express();

    app.use(helmet({
        contentSecurityPolicy: false
    }));

    app.use(cors({
        origin: process.env.NODE_ENV === 'production' ? false : true,
        credentials: true
    }));

    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    app.use((req, res, next) => {
        logger.info(`${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.get('User-Agent'),
            body: req.method === 'POST' ? req.body : undefined
        });
        next();
    });

    app.use('/api', createRoutes(deps));

    app.get('/health', (req, res) => {
        const health: HealthCheckResponse = {
            status: 'OK',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            memory: process.memoryUsage(),
            version: process.env.npm_package_version || '1.0.0'
        };
        res.json(health);
    });

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
