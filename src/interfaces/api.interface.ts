// src/interfaces/api.interface.ts

/**
 * API request/response interfaces
 */

// ============================================================================
// ERROR PAYLOADS
// ============================================================================

export type FaultKind = 'business' | 'internal';

export interface ExceptionPayload {
    kind: FaultKind;
    code: string;
    message: string;
    details?: Record<string, unknown>;
}

export enum APIErrorCodes {
    // General Request Errors
    BAD_REQUEST = 'BAD_REQUEST',
    INVALID_QUERY = 'INVALID_QUERY',
    NOT_FOUND = 'NOT_FOUND',

    // Entity Errors
    ENTITY_NOT_FOUND = 'ENTITY_NOT_FOUND',
    DUPLICATE_SKU = 'DUPLICATE_SKU',

    // Server Errors
    INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

export interface ValidationFailure {
    field: string;
    message: string;
    value?: unknown;
}

// ============================================================================
// PAGINATION INTERFACES
// ============================================================================

export interface PageResult<T> {
    items: T[];
    nextPageLink: string | null;
    count: number | null;
}

export interface CsvExportOptions {
    columns?: readonly string[];
}

// ============================================================================
// HEALTH CHECK INTERFACES
// ============================================================================

export interface HealthCheckResponse {
    status: 'healthy' | 'unhealthy' | 'degraded';
    timestamp: string;
    uptime: number;
    environment: string;
    version: string;
    services: ServiceHealthStatus;
}

export interface ServiceHealthStatus {
    database: ServiceStatus;
}

export interface ServiceStatus {
    status: 'up' | 'down' | 'degraded';
    driver?: string;
    responseTime?: number; // ms
    lastChecked: string;
    error?: string;
}
