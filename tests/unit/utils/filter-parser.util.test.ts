import { describe, expect, it } from 'vitest';
import { collectFilterFields, MAX_FILTER_DEPTH, parseFilter } from '../../../src/utils/filter-parser.util';
import { BusinessError } from '../../../src/utils/errors.util';
import { captureError } from '../../helpers/test-utils';

describe('parseFilter', () => {
    it('parses a conjunction of comparisons', () => {
        expect(parseFilter("price gt 10 and category eq 'Tools'")).toEqual({
            type: 'and',
            left: { type: 'comparison', field: 'price', operator: 'gt', value: 10 },
            right: { type: 'comparison', field: 'category', operator: 'eq', value: 'Tools' },
        });
    });

    it('binds and tighter than or', () => {
        expect(parseFilter('a eq 1 or b eq 2 and c eq 3')).toEqual({
            type: 'or',
            left: { type: 'comparison', field: 'a', operator: 'eq', value: 1 },
            right: {
                type: 'and',
                left: { type: 'comparison', field: 'b', operator: 'eq', value: 2 },
                right: { type: 'comparison', field: 'c', operator: 'eq', value: 3 },
            },
        });
    });

    it('honours parentheses and not', () => {
        expect(parseFilter('not (active eq true or stock le -1.5)')).toEqual({
            type: 'not',
            operand: {
                type: 'or',
                left: { type: 'comparison', field: 'active', operator: 'eq', value: true },
                right: { type: 'comparison', field: 'stock', operator: 'le', value: -1.5 },
            },
        });
    });

    it('parses string functions with escaped quotes', () => {
        expect(parseFilter("contains(name,'O''Brien')")).toEqual({
            type: 'function',
            name: 'contains',
            field: 'name',
            value: "O'Brien",
        });
    });

    it('treats keywords case-insensitively but keeps field names', () => {
        expect(parseFilter('Price GT 5 AND category NE null')).toEqual({
            type: 'and',
            left: { type: 'comparison', field: 'Price', operator: 'gt', value: 5 },
            right: { type: 'comparison', field: 'category', operator: 'ne', value: null },
        });
    });

    it('accepts nested field paths', () => {
        expect(parseFilter('dimensions/width ge 2.5')).toEqual({
            type: 'comparison',
            field: 'dimensions/width',
            operator: 'ge',
            value: 2.5,
        });
    });

    it('allows a function name as a plain field', () => {
        expect(parseFilter("contains eq 'x'")).toEqual({
            type: 'comparison',
            field: 'contains',
            operator: 'eq',
            value: 'x',
        });
    });

    it.each([
        ['price gt', 'Invalid $filter: expected a literal but reached the end'],
        ["name eq 'abc", 'Invalid $filter: unterminated string literal'],
        ['price between 1', 'Invalid $filter: expected one of eq, ne, gt, ge, lt, le'],
        ['price gt 1)', 'Invalid $filter: unexpected trailing input'],
        ['(price gt 1', "Invalid $filter: expected ')' but reached the end"],
        ['price eq maybe', "Invalid $filter: unknown literal 'maybe'"],
        ['startswith(name, 3)', 'Invalid $filter: startswith expects a string literal'],
        ['price # 1', "Invalid $filter: unexpected character '#'"],
        ['   ', 'Invalid $filter: expression is empty'],
    ])('rejects %j', (input, message) => {
        const error = captureError(() => parseFilter(input));

        expect(error).toBeInstanceOf(BusinessError);
        expect(error).toMatchObject({ code: 'INVALID_QUERY', message });
    });

    it('accepts nesting up to the limit', () => {
        const nots = parseFilter(`${'not '.repeat(MAX_FILTER_DEPTH)}a eq 1`);
        const parens = parseFilter(`${'('.repeat(MAX_FILTER_DEPTH)}a eq 1${')'.repeat(MAX_FILTER_DEPTH)}`);

        expect(nots.type).toBe('not');
        expect(parens).toEqual({ type: 'comparison', field: 'a', operator: 'eq', value: 1 });
    });

    it('rejects nesting beyond the limit', () => {
        const error = captureError(() => parseFilter(`${'not '.repeat(MAX_FILTER_DEPTH + 1)}a eq 1`));

        expect(error).toMatchObject({
            code: 'INVALID_QUERY',
            message: 'Invalid $filter: expression nested too deeply',
            details: { parameter: '$filter', position: MAX_FILTER_DEPTH * 4 },
        });
    });

    it('rejects deeply nested input as a business fault instead of overflowing', () => {
        const input = `${'not '.repeat(1500)}${'('.repeat(4000)}sku eq 'A'${')'.repeat(4000)}`;

        const error = captureError(() => parseFilter(input));

        expect(error).toBeInstanceOf(BusinessError);
        expect(error).toMatchObject({ message: 'Invalid $filter: expression nested too deeply' });
    });
});

describe('collectFilterFields', () => {
    it('lists fields in order of appearance', () => {
        const filter = parseFilter("not (a eq 1) and (startswith(b,'x') or c/d lt 2)");

        expect(collectFilterFields(filter)).toEqual(['a', 'b', 'c/d']);
    });
});
