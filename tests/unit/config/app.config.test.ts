import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { loadAppConfig } from '../../../src/config/app.config';

describe('loadAppConfig', () => {
    it('falls back to defaults', () => {
        expect(loadAppConfig({})).toEqual({
            server: { port: 8080, environment: 'development', corsOrigins: [], maxRequestSize: '1mb' },
            database: { driver: 'memory' },
            query: { maxPageSize: 100 },
            errors: { exposeInternalErrors: true },
            logging: { level: 'info', directory: join(process.cwd(), 'logs') },
        });
    });

    it('reads server, query and logging settings', () => {
        const config = loadAppConfig({
            PORT: '3001',
            ALLOWED_ORIGINS: 'https://a.example.test, https://b.example.test,',
            QUERY_MAX_PAGE_SIZE: '25',
            LOG_LEVEL: 'debug',
            LOG_DIRECTORY: '/var/log/entity-api',
        });

        expect(config.server.port).toBe(3001);
        expect(config.server.corsOrigins).toEqual(['https://a.example.test', 'https://b.example.test']);
        expect(config.query.maxPageSize).toBe(25);
        expect(config.logging).toEqual({ level: 'debug', directory: '/var/log/entity-api' });
    });

    it('hides internal errors in production unless told otherwise', () => {
        expect(loadAppConfig({ NODE_ENV: 'production' }).errors.exposeInternalErrors).toBe(false);
        expect(loadAppConfig({ NODE_ENV: 'production', EXPOSE_INTERNAL_ERRORS: '1' }).errors.exposeInternalErrors).toBe(true);
        expect(loadAppConfig({ EXPOSE_INTERNAL_ERRORS: 'false' }).errors.exposeInternalErrors).toBe(false);
    });

    it('rejects malformed values', () => {
        expect(() => loadAppConfig({ PORT: 'abc' })).toThrow(
            'Invalid environment configuration: PORT: Expected number, received nan'
        );
        expect(() => loadAppConfig({ QUERY_MAX_PAGE_SIZE: '0' })).toThrow(/^Invalid environment configuration: QUERY_MAX_PAGE_SIZE/);
    });

    it('requires credentials for the Firestore driver', () => {
        expect(() => loadAppConfig({ PERSISTENCE_DRIVER: 'firestore' })).toThrow(
            'GOOGLE_CLOUD_PROJECT_ID environment variable is required'
        );
        expect(() => loadAppConfig({ PERSISTENCE_DRIVER: 'firestore', GOOGLE_CLOUD_PROJECT_ID: 'demo-project' })).toThrow(
            'GOOGLE_APPLICATION_CREDENTIALS environment variable is required'
        );
    });

    it('builds the Firestore settings', () => {
        const config = loadAppConfig({
            PERSISTENCE_DRIVER: 'firestore',
            GOOGLE_CLOUD_PROJECT_ID: 'demo-project',
            GOOGLE_APPLICATION_CREDENTIALS: '/secrets/service-account.json',
            FIRESTORE_DATABASE_ID: 'inventory',
        });

        expect(config.database).toEqual({
            driver: 'firestore',
            firebase: {
                projectId: 'demo-project',
                serviceAccountPath: '/secrets/service-account.json',
                databaseId: 'inventory',
            },
        });
    });
});
