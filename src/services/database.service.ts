import { databaseConfig } from '../config/database.config';
import type { DatabaseConfig, PersistenceDriver } from '../interfaces/config.interface';
import type { ServiceStatus } from '../interfaces/api.interface';
import type { EntityService } from '../interfaces/entity.interface';
import type { Product } from '../interfaces/product.interface';
import { InMemoryRepository } from '../repositories/in-memory.repository';
import { FirestoreProductRepository } from '../repositories/product.repository';
import { logger } from '../utils/logger.util';

export class DatabaseService {
    private static instance: DatabaseService;
    private driver: PersistenceDriver = 'memory';
    private productStore: EntityService<Product> | null = null;

    private constructor() {}

    static getInstance(): DatabaseService {
        if (!DatabaseService.instance) {
            DatabaseService.instance = new DatabaseService();
        }
        return DatabaseService.instance;
    }

    async initialize(config: DatabaseConfig): Promise<void> {
        try {
            this.driver = config.driver;
            this.productStore = null;

            if (config.driver === 'firestore') {
                await databaseConfig.initialize(config.firebase);
            }
            logger.info(`Database service initialized successfully (driver: ${config.driver})`);
        } catch (error) {
            logger.error('Failed to initialize database service:', error);
            throw error;
        }
    }

    get products(): EntityService<Product> {
        if (!this.productStore) {
            this.productStore = this.driver === 'firestore'
                ? new FirestoreProductRepository()
                : new InMemoryRepository<Product>('Product');
        }
        return this.productStore;
    }

    async getHealthStatus(): Promise<ServiceStatus> {
        const lastChecked = new Date().toISOString();

        if (this.driver === 'memory') {
            return { status: 'up', driver: this.driver, responseTime: 0, lastChecked };
        }

        const health = await databaseConfig.getHealthStatus();
        return { ...health, driver: this.driver, lastChecked };
    }

    async close(): Promise<void> {
        if (this.driver === 'firestore') {
            await databaseConfig.close();
        }
    }
}

export const databaseService = DatabaseService.getInstance();
