// src/config/app.config.ts

import {config as loadEnv} from 'dotenv';
import {join} from 'path';
import {z} from 'zod';
import type {AppConfig} from '../interfaces/config.interface';

// Load environment variables before anything reads them
loadEnv();

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
    LOG_DIRECTORY: z.string().min(1).optional(),
    ALLOWED_ORIGINS: z.string().optional(),
    MAX_REQUEST_SIZE: z.string().default('1mb'),
    PERSISTENCE_DRIVER: z.enum(['memory', 'firestore']).default('memory'),
    QUERY_MAX_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
    EXPOSE_INTERNAL_ERRORS: booleanFlag.optional(),
    GOOGLE_CLOUD_PROJECT_ID: z.string().min(1).optional(),
    GOOGLE_APPLICATION_CREDENTIALS: z.string().min(1).optional(),
    FIRESTORE_DATABASE_ID: z.string().min(1).optional(),
});

/**
 * Build the application configuration from environment variables.
 * Throws when a variable is malformed or the Firestore driver lacks credentials.
 */
export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${problems}`);
    }

    const vars = parsed.data;

    if (vars.PERSISTENCE_DRIVER === 'firestore') {
        if (!vars.GOOGLE_CLOUD_PROJECT_ID) {
            throw new Error('GOOGLE_CLOUD_PROJECT_ID environment variable is required');
        }
        if (!vars.GOOGLE_APPLICATION_CREDENTIALS) {
            throw new Error('GOOGLE_APPLICATION_CREDENTIALS environment variable is required');
        }
    }

    return {
        server: {
            port: vars.PORT,
            environment: vars.NODE_ENV,
            corsOrigins: vars.ALLOWED_ORIGINS
                ? vars.ALLOWED_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean)
                : [],
            maxRequestSize: vars.MAX_REQUEST_SIZE,
        },
        database: {
            driver: vars.PERSISTENCE_DRIVER,
            ...(vars.GOOGLE_CLOUD_PROJECT_ID && vars.GOOGLE_APPLICATION_CREDENTIALS ? {
                firebase: {
                    projectId: vars.GOOGLE_CLOUD_PROJECT_ID,
                    serviceAccountPath: vars.GOOGLE_APPLICATION_CREDENTIALS,
                    databaseId: vars.FIRESTORE_DATABASE_ID,
                },
            } : {}),
        },
        query: {
            maxPageSize: vars.QUERY_MAX_PAGE_SIZE,
        },
        errors: {
            exposeInternalErrors: vars.EXPOSE_INTERNAL_ERRORS ?? vars.NODE_ENV !== 'production',
        },
        logging: {
            level: vars.LOG_LEVEL,
            directory: vars.LOG_DIRECTORY ?? join(process.cwd(), 'logs'),
        },
    };
};

export const appConfig = loadAppConfig();
