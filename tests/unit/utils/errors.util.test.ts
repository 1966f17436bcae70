import { describe, expect, it } from 'vitest';
import { APIErrorCodes } from '../../../src/interfaces/api.interface';
import {
    buildExceptionPayload,
    BusinessError,
    classifyFailure,
    describeError,
    EntityNotFoundError,
    isBusinessFault,
} from '../../../src/utils/errors.util';

describe('BusinessError', () => {
    it('is an Error tagged as a business fault', () => {
        const error = new BusinessError('OUT_OF_STOCK', 'Nothing left', { sku: 'HAM-001' });

        expect(error).toBeInstanceOf(Error);
        expect(error).toBeInstanceOf(BusinessError);
        expect(error.name).toBe('BusinessError');
        expect(error.kind).toBe('business');
        expect(error.details).toEqual({ sku: 'HAM-001' });
    });

    it('names a missing entity', () => {
        const error = new EntityNotFoundError('Product', 7);

        expect(error).toBeInstanceOf(BusinessError);
        expect(error.name).toBe('EntityNotFoundError');
        expect(error.code).toBe(APIErrorCodes.ENTITY_NOT_FOUND);
        expect(error.message).toBe('Product 7 not found');
        expect(error.details).toEqual({ entity: 'Product', id: 7 });
    });
});

describe('isBusinessFault', () => {
    it('recognises the tag on plain objects', () => {
        expect(isBusinessFault({ kind: 'business', code: 'X', message: 'm' })).toBe(true);
    });

    it('rejects anything else', () => {
        expect(isBusinessFault(new Error('Product 1 not found'))).toBe(false);
        expect(isBusinessFault({ kind: 'business', code: 1, message: 'm' })).toBe(false);
        expect(isBusinessFault({ kind: 'internal', code: 'X', message: 'm' })).toBe(false);
        expect(isBusinessFault(null)).toBe(false);
        expect(isBusinessFault('business')).toBe(false);
    });
});

describe('describeError', () => {
    it('reads messages from errors and strings', () => {
        expect(describeError(new TypeError('bad type'))).toBe('bad type');
        expect(describeError('oops')).toBe('oops');
        expect(describeError(42)).toBe('Unknown error');
    });
});

describe('buildExceptionPayload', () => {
    it('copies code, message and details of a business fault', () => {
        const payload = buildExceptionPayload(
            new BusinessError('DUPLICATE_SKU', 'taken', { sku: 'A-1' }),
            { exposeInternalErrors: false }
        );

        expect(payload).toEqual({ kind: 'business', code: 'DUPLICATE_SKU', message: 'taken', details: { sku: 'A-1' } });
    });

    it('leaves details out when the fault has none', () => {
        const payload = buildExceptionPayload(new BusinessError('X', 'y'), { exposeInternalErrors: false });

        expect(Object.keys(payload)).toEqual(['kind', 'code', 'message']);
    });

    it('hides internal messages unless exposed', () => {
        const error = new Error('connection reset');

        expect(buildExceptionPayload(error, { exposeInternalErrors: false })).toEqual({
            kind: 'internal',
            code: 'INTERNAL_SERVER_ERROR',
            message: 'Internal Server Error',
        });
        expect(buildExceptionPayload(error, { exposeInternalErrors: true })).toEqual({
            kind: 'internal',
            code: 'INTERNAL_SERVER_ERROR',
            message: 'connection reset',
        });
    });
});

describe('classifyFailure', () => {
    it('maps business faults to a business outcome', () => {
        const outcome = classifyFailure(new EntityNotFoundError('Product', 3), { exposeInternalErrors: true });

        expect(outcome).toEqual({
            kind: 'business_fault',
            payload: {
                kind: 'business',
                code: 'ENTITY_NOT_FOUND',
                message: 'Product 3 not found',
                details: { entity: 'Product', id: 3 },
            },
        });
    });

    it('keeps the cause of an internal fault', () => {
        const cause = new RangeError('overflow');
        const outcome = classifyFailure(cause, { exposeInternalErrors: true });

        expect(outcome).toEqual({
            kind: 'internal_fault',
            payload: { kind: 'internal', code: 'INTERNAL_SERVER_ERROR', message: 'overflow' },
            cause,
        });
    });
});
