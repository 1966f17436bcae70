import { describe, expect, it } from 'vitest';
import type { QueryOptions } from '../../../src/interfaces/query.interface';
import { parseFilter } from '../../../src/utils/filter-parser.util';
import { applyQueryOptions, readField } from '../../../src/utils/query-engine.util';

interface Row {
    id: number;
    name: string;
    category: string | null;
    price: number;
    active: boolean;
    tags?: { color: string } | null;
}

const rows: Row[] = [
    { id: 1, name: 'Hammer', category: 'Tools', price: 25, active: true, tags: { color: 'red' } },
    { id: 2, name: 'Screwdriver', category: 'Tools', price: 8.5, active: true, tags: { color: 'blue' } },
    { id: 3, name: 'Paint', category: 'Supplies', price: 12, active: false, tags: null },
    { id: 4, name: 'Brush', category: 'Supplies', price: 4, active: true },
    { id: 5, name: 'Ladder', category: null, price: 80, active: true },
];

const baseOptions: QueryOptions = { orderBy: [], skip: 0, count: false, pageSize: 100 };

const idsFor = (filter: string): number[] =>
    applyQueryOptions(rows, { ...baseOptions, filter: parseFilter(filter) }).items.map(row => row.id);

describe('applyQueryOptions', () => {
    it('filters and reports the filtered total', () => {
        const result = applyQueryOptions(rows, { ...baseOptions, filter: parseFilter("category eq 'Tools'") });

        expect(result.items.map(row => row.id)).toEqual([1, 2]);
        expect(result.totalCount).toBe(2);
        expect(result.hasMore).toBe(false);
    });

    it('orders descending', () => {
        const result = applyQueryOptions(rows, { ...baseOptions, orderBy: [{ field: 'price', direction: 'desc' }] });

        expect(result.items.map(row => row.id)).toEqual([5, 1, 3, 2, 4]);
    });

    it('orders by several keys with nulls first', () => {
        const result = applyQueryOptions(rows, {
            ...baseOptions,
            orderBy: [
                { field: 'category', direction: 'asc' },
                { field: 'price', direction: 'asc' },
            ],
        });

        expect(result.items.map(row => row.id)).toEqual([5, 4, 3, 2, 1]);
    });

    it('skips and takes within the requested window', () => {
        const result = applyQueryOptions(rows, { ...baseOptions, skip: 1, top: 2 });

        expect(result.items.map(row => row.id)).toEqual([2, 3]);
        expect(result.totalCount).toBe(5);
        expect(result.hasMore).toBe(false);
    });

    it('caps a page at the server page size', () => {
        const result = applyQueryOptions(rows, { ...baseOptions, pageSize: 2 });

        expect(result.items.map(row => row.id)).toEqual([1, 2]);
        expect(result.hasMore).toBe(true);
    });

    it('caps $top at the server page size and signals the remainder', () => {
        const result = applyQueryOptions(rows, { ...baseOptions, top: 4, pageSize: 3 });

        expect(result.items.map(row => row.id)).toEqual([1, 2, 3]);
        expect(result.hasMore).toBe(true);
    });

    it('compares against null', () => {
        expect(idsFor('category eq null')).toEqual([5]);
        expect(idsFor('category ne null')).toEqual([1, 2, 3, 4]);
    });

    it('follows nested paths', () => {
        expect(idsFor("tags/color eq 'red'")).toEqual([1]);
    });

    it('treats mismatched types as unequal', () => {
        expect(idsFor("price eq '25'")).toEqual([]);
        expect(idsFor("price ne '25'")).toEqual([1, 2, 3, 4, 5]);
        expect(idsFor("price gt 'a'")).toEqual([]);
    });

    it('combines not, or and comparisons', () => {
        expect(idsFor("not (category eq 'Tools' or price gt 50)")).toEqual([3, 4]);
    });

    it('evaluates string functions', () => {
        expect(idsFor("contains(name,'er')")).toEqual([1, 2, 5]);
        expect(idsFor("startswith(name,'B')")).toEqual([4]);
        expect(idsFor("endswith(name,'t')")).toEqual([3]);
    });

    it('compares booleans', () => {
        expect(idsFor('active eq false')).toEqual([3]);
    });

    it('leaves the source untouched', () => {
        const source = [...rows];

        applyQueryOptions(source, { ...baseOptions, orderBy: [{ field: 'price', direction: 'asc' }], top: 1 });

        expect(source).toEqual(rows);
    });

    it('accepts any iterable', () => {
        const result = applyQueryOptions(new Set(rows), { ...baseOptions, top: 1 });

        expect(result.items).toEqual([rows[0]]);
    });
});

describe('readField', () => {
    it('returns dates as ISO strings', () => {
        expect(readField({ createdAt: new Date(Date.UTC(2024, 1, 3)) }, 'createdAt')).toBe('2024-02-03T00:00:00.000Z');
    });

    it('ignores inherited properties', () => {
        expect(readField({}, 'toString')).toBeUndefined();
        expect(readField({ a: null }, 'a/b')).toBeUndefined();
    });
});
