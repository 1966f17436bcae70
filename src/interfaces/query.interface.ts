/**
 * Query option interfaces for list endpoints ($filter, $orderby, $top, $skip, $count)
 */

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le';

export type StringFunction = 'contains' | 'startswith' | 'endswith';

export type FilterLiteral = string | number | boolean | null;

export type FilterNode =
    | { type: 'comparison'; field: string; operator: ComparisonOperator; value: FilterLiteral }
    | { type: 'function'; name: StringFunction; field: string; value: string }
    | { type: 'and' | 'or'; left: FilterNode; right: FilterNode }
    | { type: 'not'; operand: FilterNode };

export interface OrderByClause {
    field: string;
    direction: 'asc' | 'desc';
}

export interface QueryOptions {
    filter?: FilterNode;
    orderBy: OrderByClause[];
    top?: number;
    skip: number;
    count: boolean;
    pageSize: number; // server page size
}

export interface QueryParseOptions {
    maxPageSize: number;
    allowedFields?: readonly string[];
}

export interface AppliedQuery<T> {
    items: T[];
    totalCount: number; // filtered, before skip/take
    hasMore: boolean;
}
