import type {AppliedQuery, FilterLiteral, FilterNode, OrderByClause, QueryOptions} from '../interfaces/query.interface';
import {effectivePageSize} from './query-options.util';

type Comparable = string | number | boolean;

/**
 * Reads a field, following `/` separated paths into nested objects
 */
export const readField = (item: unknown, path: string): unknown => {
    let current: unknown = item;
    for (const segment of path.split('/')) {
        if (typeof current !== 'object' || current === null || !Object.prototype.hasOwnProperty.call(current, segment)) {
            return undefined;
        }
        current = Reflect.get(current, segment);
    }
    return current instanceof Date ? current.toISOString() : current;
};

const isComparable = (value: unknown): value is Comparable =>
    typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

// Same-type comparison only; undefined when the pair is unordered
const compareValues = (left: Comparable, right: Comparable): number | undefined => {
    if (typeof left === 'number' && typeof right === 'number') {
        return left === right ? 0 : left < right ? -1 : 1;
    }
    if (typeof left === 'string' && typeof right === 'string') {
        return left === right ? 0 : left < right ? -1 : 1;
    }
    if (typeof left === 'boolean' && typeof right === 'boolean') {
        return left === right ? 0 : left ? 1 : -1;
    }
    return undefined;
};

const matchesComparison = (value: unknown, operator: string, literal: FilterLiteral): boolean => {
    if (literal === null) {
        const isNull = value === null || value === undefined;
        if (operator === 'eq') return isNull;
        if (operator === 'ne') return !isNull;
        return false;
    }

    if (!isComparable(value)) {
        return operator === 'ne';
    }

    const order = compareValues(value, literal);
    switch (operator) {
        case 'eq': return order === 0;
        case 'ne': return order !== 0;
        case 'gt': return order !== undefined && order > 0;
        case 'ge': return order !== undefined && order >= 0;
        case 'lt': return order !== undefined && order < 0;
        case 'le': return order !== undefined && order <= 0;
        default: return false;
    }
};

export const matchesFilter = (item: unknown, node: FilterNode): boolean => {
    switch (node.type) {
        case 'comparison':
            return matchesComparison(readField(item, node.field), node.operator, node.value);
        case 'function': {
            const value = readField(item, node.field);
            if (typeof value !== 'string') return false;
            if (node.name === 'contains') return value.includes(node.value);
            if (node.name === 'startswith') return value.startsWith(node.value);
            return value.endsWith(node.value);
        }
        case 'and':
            return matchesFilter(item, node.left) && matchesFilter(item, node.right);
        case 'or':
            return matchesFilter(item, node.left) || matchesFilter(item, node.right);
        case 'not':
            return !matchesFilter(item, node.operand);
    }
};

// Nulls first; values of different types keep their relative order
const compareForSort = (left: unknown, right: unknown): number => {
    const leftMissing = left === null || left === undefined;
    const rightMissing = right === null || right === undefined;
    if (leftMissing || rightMissing) {
        return leftMissing === rightMissing ? 0 : leftMissing ? -1 : 1;
    }
    if (!isComparable(left) || !isComparable(right)) return 0;
    return compareValues(left, right) ?? 0;
};

const sortItems = <T>(items: T[], orderBy: OrderByClause[]): T[] => {
    if (orderBy.length === 0) return items;
    return [...items].sort((a, b) => {
        for (const clause of orderBy) {
            const result = compareForSort(readField(a, clause.field), readField(b, clause.field));
            if (result !== 0) {
                return clause.direction === 'desc' ? -result : result;
            }
        }
        return 0;
    });
};

/**
 * Apply filter, ordering and paging to a sequence without touching it.
 * `totalCount` is measured after filtering and before paging.
 */
export const applyQueryOptions = <T>(source: Iterable<T>, options: QueryOptions): AppliedQuery<T> => {
    const filter = options.filter;
    const all = Array.from(source);
    const filtered = filter ? all.filter(item => matchesFilter(item, filter)) : all;
    const ordered = sortItems(filtered, options.orderBy);

    const windowEnd = options.top !== undefined ? options.skip + options.top : ordered.length;
    const pageWindow = ordered.slice(options.skip, windowEnd);
    const items = pageWindow.slice(0, effectivePageSize(options));

    return {
        items,
        totalCount: filtered.length,
        hasMore: pageWindow.length > items.length,
    };
};
