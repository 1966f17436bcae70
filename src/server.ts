import { appConfig } from './config/app.config';
import { createApp } from './app';
import { databaseService } from './services/database.service';
import { logger } from './utils/logger.util';

async function startServer(): Promise<void> {
    // Initialize database service FIRST
    logger.info('Initializing database service...');
    await databaseService.initialize(appConfig.database);

    // THEN start the HTTP server
    const app = createApp();
    const server = app.listen(appConfig.server.port, () => {
        logger.info(`Entity API started on port ${appConfig.server.port}`);
        logger.info(`Environment: ${appConfig.server.environment}`);
        logger.info(`Health check: http://localhost:${appConfig.server.port}/health`);
    });

    const shutdown = (signal: string): void => {
        logger.info(`${signal} received, shutting down gracefully`);
        server.close(() => {
            databaseService.close()
                .then(() => {
                    logger.info('Process terminated');
                    process.exit(0);
                })
                .catch((error: unknown) => {
                    logger.error('Error during shutdown:', error);
                    process.exit(1);
                });
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
});
