import { Request, Response } from 'express';
import { appConfig } from '../config/app.config';
import type { HealthCheckResponse } from '../interfaces/api.interface';
import { databaseService } from '../services/database.service';
import { requestOutcomeHandler } from '../services/request-outcome.service';
import { logger } from '../utils/logger.util';

const VERSION = '1.0.0';

export const healthCheck = async (req: Request, res: Response): Promise<void> => {
    await requestOutcomeHandler.handleCallback(res, async (): Promise<HealthCheckResponse> => {
        const database = await databaseService.getHealthStatus();

        const healthInfo: HealthCheckResponse = {
            status: database.status === 'up' ? 'healthy' : database.status === 'degraded' ? 'degraded' : 'unhealthy',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            environment: appConfig.server.environment,
            version: VERSION,
            services: { database }
        };

        logger.debug('Health check requested', { healthInfo });
        return healthInfo;
    });
};

export const readinessCheck = async (req: Request, res: Response): Promise<void> => {
    try {
        const database = await databaseService.getHealthStatus();
        const readiness = {
            status: database.status === 'down' ? 'not_ready' : 'ready',
            timestamp: new Date().toISOString(),
            checks: {
                database: database.status !== 'down'
            }
        };

        const allReady = Object.values(readiness.checks).every(check => check === true);

        res.status(allReady ? 200 : 503).json(readiness);
    } catch (error) {
        requestOutcomeHandler.handleFailure(res, error);
    }
};
