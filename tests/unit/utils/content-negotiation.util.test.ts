import { describe, expect, it } from 'vitest';
import { acceptsMediaType } from '../../../src/utils/content-negotiation.util';

describe('acceptsMediaType', () => {
    it.each([
        ['text/csv', true],
        ['TEXT/CSV', true],
        ['application/json, text/csv; q=0.5', true],
        ['text/csv;q=0', false],
        ['text/csv;q=abc', false],
        ['application/json', false],
        ['*/*', false],
        ['text/*', false],
        ['', false],
    ])('Accept %j -> %s', (header, expected) => {
        expect(acceptsMediaType(header, 'text/csv')).toBe(expected);
    });

    it('is false without an Accept header', () => {
        expect(acceptsMediaType(undefined, 'text/csv')).toBe(false);
    });
});
