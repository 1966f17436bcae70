import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import { appConfig } from './config/app.config';
import { createProductController } from './controllers/product.controller';
import type { RequestOutcomeHandler } from './services/request-outcome.service';
import { ProductService } from './services/product.service';
import { databaseService } from './services/database.service';
import { errorHandler, notFoundHandler, requestId } from './middleware';
import { createProductRoutes, healthRoutes } from './routes';
import { logger } from './utils/logger.util';

export interface AppDependencies {
    productService?: ProductService;
    outcomes?: RequestOutcomeHandler;
    maxPageSize?: number;
}

export const createApp = (dependencies: AppDependencies = {}): express.Express => {
    const productService = dependencies.productService ?? new ProductService(databaseService.products);
    const productController = createProductController(productService, {
        outcomes: dependencies.outcomes,
        maxPageSize: dependencies.maxPageSize
    });

    const app = express();

    // Security and performance middleware
    app.use(helmet());
    app.use(compression());
    app.use(cors({
        origin: appConfig.server.environment === 'production'
            ? appConfig.server.corsOrigins
            : '*',
        exposedHeaders: ['Content-Disposition', 'X-Request-Id']
    }));
    app.use(requestId);

    // Logging
    if (appConfig.server.environment !== 'test') {
        app.use(morgan('combined', {
            stream: { write: (message: string) => logger.info(message.trim()) }
        }));
    }

    // Body parsing
    app.use(express.json({ limit: appConfig.server.maxRequestSize }));

    app.use('/health', healthRoutes);
    app.use('/api/v1/products', createProductRoutes(productController));

    app.get('/api/v1', (req, res) => {
        res.json({
            message: 'Entity API v1',
            version: '1.0.0',
            status: 'active',
            endpoints: {
                health: '/health',
                products: '/api/v1/products'
            }
        });
    });

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
};
