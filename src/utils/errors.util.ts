import {APIErrorCodes} from '../interfaces/api.interface';
import type {ExceptionPayload} from '../interfaces/api.interface';
import {businessFault, internalFault} from '../interfaces/outcome.interface';
import type {FaultOutcome} from '../interfaces/outcome.interface';

export const BUSINESS_FAULT = 'business' as const;

/**
 * Expected, client-correctable failure. Classified by its `kind` tag, never by message.
 */
export class BusinessError extends Error {
    readonly kind = BUSINESS_FAULT;
    readonly code: string;
    readonly details?: Record<string, unknown>;

    constructor(code: string, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class EntityNotFoundError extends BusinessError {
    constructor(entityName: string, id: number) {
        super(APIErrorCodes.ENTITY_NOT_FOUND, `${entityName} ${id} not found`, {entity: entityName, id});
    }
}

export class DuplicateSkuError extends BusinessError {
    constructor(sku: string, productId: number) {
        super(APIErrorCodes.DUPLICATE_SKU, `SKU ${sku} is already used by product ${productId}`, {sku, productId});
    }
}

export const isBusinessFault = (error: unknown): error is BusinessError =>
    typeof error === 'object' &&
    error !== null &&
    'kind' in error &&
    error.kind === BUSINESS_FAULT &&
    'code' in error &&
    typeof error.code === 'string' &&
    'message' in error &&
    typeof error.message === 'string';

export interface PayloadOptions {
    exposeInternalErrors: boolean;
}

export const describeError = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'Unknown error';
};

/**
 * Deterministic payload for any raised failure
 */
export const buildExceptionPayload = (error: unknown, options: PayloadOptions): ExceptionPayload => {
    if (isBusinessFault(error)) {
        return {
            kind: 'business',
            code: error.code,
            message: error.message,
            ...(error.details && {details: error.details}),
        };
    }

    return {
        kind: 'internal',
        code: APIErrorCodes.INTERNAL_SERVER_ERROR,
        message: options.exposeInternalErrors ? describeError(error) : 'Internal Server Error',
    };
};

export const classifyFailure = (error: unknown, options: PayloadOptions): FaultOutcome => {
    const payload = buildExceptionPayload(error, options);
    return payload.kind === 'business' ? businessFault(payload) : internalFault(payload, error);
};
