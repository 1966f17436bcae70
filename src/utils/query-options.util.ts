import {z} from 'zod';
import {APIErrorCodes} from '../interfaces/api.interface';
import type {OrderByClause, QueryOptions, QueryParseOptions} from '../interfaces/query.interface';
import {BusinessError} from './errors.util';
import {collectFilterFields, parseFilter} from './filter-parser.util';

const FIELD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\/[A-Za-z_][A-Za-z0-9_]*)*$/;

const zQueryParameters = z.object({
    $filter: z.string().trim().min(1).optional(),
    $orderby: z.string().trim().min(1).optional(),
    $top: z.string().regex(/^\d+$/, 'Expected a non-negative integer').transform(Number).optional(),
    $skip: z.string().regex(/^\d+$/, 'Expected a non-negative integer').transform(Number).optional(),
    $count: z.enum(['true', 'false']).transform(value => value === 'true').optional(),
});

const invalidQuery = (message: string, details?: Record<string, unknown>): BusinessError =>
    new BusinessError(APIErrorCodes.INVALID_QUERY, message, details);

const parseOrderBy = (input: string): OrderByClause[] =>
    input.split(',').map(part => {
        const [field, direction, ...rest] = part.trim().split(/\s+/);
        const normalized = (direction ?? 'asc').toLowerCase();

        if (!field || !FIELD_PATTERN.test(field) || rest.length > 0 || (normalized !== 'asc' && normalized !== 'desc')) {
            throw invalidQuery(`Invalid $orderby clause '${part.trim()}'`, {parameter: '$orderby'});
        }

        return {field, direction: normalized};
    });

const assertAllowed = (fields: string[], allowed: readonly string[] | undefined, parameter: string): void => {
    if (!allowed) return;
    const unknown = fields.filter(field => !allowed.includes(field.split('/')[0] ?? field));
    if (unknown.length > 0) {
        throw invalidQuery(`Unknown field(s) in ${parameter}: ${unknown.join(', ')}`, {
            parameter,
            fields: unknown,
            allowedFields: [...allowed],
        });
    }
};

/**
 * Parse `$filter`, `$orderby`, `$top`, `$skip` and `$count` from a request query.
 * Other parameters are ignored.
 */
export const parseQueryOptions = (query: unknown, options: QueryParseOptions): QueryOptions => {
    const parsed = zQueryParameters.safeParse(query ?? {});
    if (!parsed.success) {
        throw invalidQuery('Invalid query parameters', {
            issues: parsed.error.issues.map(issue => ({
                parameter: issue.path.join('.'),
                message: issue.message,
            })),
        });
    }

    const {$filter, $orderby, $top, $skip, $count} = parsed.data;

    const filter = $filter !== undefined ? parseFilter($filter) : undefined;
    if (filter) {
        assertAllowed(collectFilterFields(filter), options.allowedFields, '$filter');
    }

    const orderBy = $orderby !== undefined ? parseOrderBy($orderby) : [];
    assertAllowed(orderBy.map(clause => clause.field), options.allowedFields, '$orderby');

    return {
        ...(filter && {filter}),
        orderBy,
        ...($top !== undefined && {top: $top}),
        skip: $skip ?? 0,
        count: $count ?? false,
        pageSize: options.maxPageSize,
    };
};

/**
 * Number of items a page may hold under these options
 */
export const effectivePageSize = (options: QueryOptions): number =>
    Math.min(options.top ?? options.pageSize, options.pageSize);

/**
 * Link to the following page, or null when nothing remains.
 * Keeps every other query parameter of the original request.
 */
export const buildNextPageLink = (
    requestUrl: string,
    options: QueryOptions,
    returned: number,
    hasMore: boolean
): string | null => {
    if (!hasMore) return null;

    const url = new URL(requestUrl);
    url.searchParams.set('$skip', String(options.skip + returned));
    if (options.top !== undefined) {
        url.searchParams.set('$top', String(Math.max(options.top - returned, 0)));
    }
    return url.toString();
};
