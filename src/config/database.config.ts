// src/config/database.config.ts

import admin from 'firebase-admin';
import {getFirestore} from 'firebase-admin/firestore';
import type {FirebaseConfig} from '../interfaces/config.interface';
import {logger} from '../utils/logger.util';

/**
 * Firebase/Firestore database configuration and initialization
 */
class DatabaseConfig {
    private static instance: DatabaseConfig;
    private _firestore: admin.firestore.Firestore | null = null;
    private _initialized = false;

    private constructor() {}

    static getInstance(): DatabaseConfig {
        if (!DatabaseConfig.instance) {
            DatabaseConfig.instance = new DatabaseConfig();
        }
        return DatabaseConfig.instance;
    }

    get initialized(): boolean {
        return this._initialized;
    }

    /**
     * Initialize Firebase Admin SDK
     */
    initialize = async (config: FirebaseConfig | undefined): Promise<void> => {
        if (this._initialized) {
            logger.debug('Firebase already initialized');
            return;
        }

        if (!config) {
            throw new Error('Firestore configuration is missing');
        }

        try {
            // Check if Firebase app is already initialized
            if (admin.apps.length === 0) {
                admin.initializeApp({
                    credential: admin.credential.cert(config.serviceAccountPath),
                    projectId: config.projectId,
                });

                logger.info('Firebase Admin SDK initialized successfully');
            }

            if (config.databaseId) {
                this._firestore = getFirestore(admin.app(), config.databaseId);
                logger.info(`Connected to custom Firestore database: ${config.databaseId}`);
            } else {
                this._firestore = getFirestore(admin.app());
                logger.info('Connected to default Firestore database');
            }

            this._firestore.settings({
                ignoreUndefinedProperties: true,
            });

            await this.testConnection();

            this._initialized = true;
            logger.info('Database layer initialized successfully');

        } catch (error) {
            logger.error('Failed to initialize Firebase:', error);
            throw new Error(`Database initialization failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
        }
    };

    /**
     * Get Firestore instance
     */
    get firestore(): admin.firestore.Firestore {
        if (!this._firestore) {
            throw new Error('Database not initialized. Call initialize() first.');
        }
        return this._firestore;
    }

    /**
     * Test database connection
     */
    private async testConnection(): Promise<void> {
        try {
            if (!this._firestore) {
                throw new Error('Firestore not initialized');
            }

            // Try to read from a test collection
            const testDoc = this._firestore.collection('_health_check').doc('test');
            await testDoc.get();

            logger.debug('Database connection test successful');
        } catch (error) {
            logger.error('Database connection test failed:', error);
            throw error;
        }
    }

    /**
     * Get health status of database
     */
    async getHealthStatus(): Promise<{
        status: 'up' | 'down' | 'degraded';
        responseTime: number;
        error?: string;
    }> {
        const startTime = Date.now();

        try {
            await this.testConnection();
            const responseTime = Date.now() - startTime;

            return {
                status: responseTime < 1000 ? 'up' : 'degraded',
                responseTime,
            };
        } catch (error) {
            return {
                status: 'down',
                responseTime: Date.now() - startTime,
                error: error instanceof Error ? error.message : 'Unknown error',
            };
        }
    }

    /**
     * Close database connections (for graceful shutdown)
     */
    async close(): Promise<void> {
        if (this._firestore) {
            await this._firestore.terminate();
        }
        this._initialized = false;
        this._firestore = null;
        logger.info('Database connections closed');
    }
}

// Export singleton instance
export const databaseConfig = DatabaseConfig.getInstance();
