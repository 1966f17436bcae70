// src/interfaces/config.interface.ts

/**
 * Application configuration interfaces
 */

// ============================================================================
// APPLICATION CONFIGURATION
// ============================================================================

export interface AppConfig {
    server: ServerConfig;
    database: DatabaseConfig;
    query: QueryConfig;
    errors: ErrorConfig;
    logging: LoggingConfig;
}

// ============================================================================
// SERVER CONFIGURATION
// ============================================================================

export interface ServerConfig {
    port: number;
    environment: Environment;
    corsOrigins: string[];
    maxRequestSize: string; // e.g., '1mb'
}

export type Environment = 'development' | 'production' | 'test';

// ============================================================================
// DATABASE CONFIGURATION
// ============================================================================

export type PersistenceDriver = 'memory' | 'firestore';

export interface DatabaseConfig {
    driver: PersistenceDriver;
    firebase?: FirebaseConfig;
}

export interface FirebaseConfig {
    projectId: string;
    serviceAccountPath: string;
    databaseId?: string;
}

// ============================================================================
// QUERY / ERROR / LOGGING CONFIGURATION
// ============================================================================

export interface QueryConfig {
    maxPageSize: number; // server page size, upper bound for $top
}

export interface ErrorConfig {
    exposeInternalErrors: boolean;
}

export type LogLevelName = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
    level: LogLevelName;
    directory: string;
}
