import {APIErrorCodes} from '../interfaces/api.interface';
import type {ComparisonOperator, FilterLiteral, FilterNode, StringFunction} from '../interfaces/query.interface';
import {BusinessError} from './errors.util';

/**
 * Recursive-descent parser for the `$filter` expression language.
 *
 *   expr       := and ('or' and)*
 *   and        := unary ('and' unary)*
 *   unary      := 'not' unary | primary
 *   primary    := '(' expr ')' | function | comparison
 *   function   := ('contains' | 'startswith' | 'endswith') '(' field ',' string ')'
 *   comparison := field ('eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le') literal
 *
 * Keywords are case-insensitive; field names are not.
 */

type Token =
    | { type: 'identifier'; value: string; position: number }
    | { type: 'string'; value: string; position: number }
    | { type: 'number'; value: number; position: number }
    | { type: 'lparen' | 'rparen' | 'comma'; position: number };

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['eq', 'ne', 'gt', 'ge', 'lt', 'le'];
const STRING_FUNCTIONS: readonly StringFunction[] = ['contains', 'startswith', 'endswith'];

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_/]/;
const NUMBER_PATTERN = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/;

/** Deepest chain of `not` and parentheses a filter may nest */
export const MAX_FILTER_DEPTH = 100;

const invalidFilter = (message: string, position: number): BusinessError =>
    new BusinessError(APIErrorCodes.INVALID_QUERY, `Invalid $filter: ${message}`, {parameter: '$filter', position});

const tokenize = (input: string): Token[] => {
    const tokens: Token[] = [];
    let index = 0;

    while (index < input.length) {
        const char = input.charAt(index);

        if (/\s/.test(char)) {
            index++;
            continue;
        }

        if (char === '(' || char === ')' || char === ',') {
            tokens.push({type: char === '(' ? 'lparen' : char === ')' ? 'rparen' : 'comma', position: index});
            index++;
            continue;
        }

        if (char === "'") {
            const start = index;
            let value = '';
            index++;
            for (;;) {
                if (index >= input.length) {
                    throw invalidFilter('unterminated string literal', start);
                }
                const current = input.charAt(index);
                if (current === "'") {
                    // '' is an escaped quote inside a literal
                    if (input.charAt(index + 1) === "'") {
                        value += "'";
                        index += 2;
                        continue;
                    }
                    index++;
                    break;
                }
                value += current;
                index++;
            }
            tokens.push({type: 'string', value, position: start});
            continue;
        }

        const numberMatch = NUMBER_PATTERN.exec(input.slice(index));
        if (numberMatch && (char === '-' || /\d/.test(char))) {
            tokens.push({type: 'number', value: Number(numberMatch[0]), position: index});
            index += numberMatch[0].length;
            continue;
        }

        if (IDENTIFIER_START.test(char)) {
            const start = index;
            while (index < input.length && IDENTIFIER_PART.test(input.charAt(index))) {
                index++;
            }
            tokens.push({type: 'identifier', value: input.slice(start, index), position: start});
            continue;
        }

        throw invalidFilter(`unexpected character '${char}'`, index);
    }

    return tokens;
};

class FilterParser {
    private index = 0;
    private depth = 0;

    constructor(private readonly tokens: Token[], private readonly inputLength: number) {}

    parse(): FilterNode {
        if (this.tokens.length === 0) {
            throw invalidFilter('expression is empty', 0);
        }
        const node = this.parseOr();
        const extra = this.peek();
        if (extra) {
            throw invalidFilter('unexpected trailing input', extra.position);
        }
        return node;
    }

    private parseOr(): FilterNode {
        let left = this.parseAnd();
        while (this.matchKeyword('or')) {
            left = {type: 'or', left, right: this.parseAnd()};
        }
        return left;
    }

    private parseAnd(): FilterNode {
        let left = this.parseUnary();
        while (this.matchKeyword('and')) {
            left = {type: 'and', left, right: this.parseUnary()};
        }
        return left;
    }

    private parseUnary(): FilterNode {
        const start = this.peek();
        if (start && this.matchKeyword('not')) {
            return {type: 'not', operand: this.nested(start.position, () => this.parseUnary())};
        }
        return this.parsePrimary();
    }

    private parsePrimary(): FilterNode {
        const token = this.next('an expression');

        if (token.type === 'lparen') {
            const inner = this.nested(token.position, () => this.parseOr());
            this.expect('rparen', "')'");
            return inner;
        }

        if (token.type !== 'identifier') {
            throw invalidFilter('expected a field name or function', token.position);
        }

        const functionName = STRING_FUNCTIONS.find(name => name === token.value.toLowerCase());
        if (functionName && this.peek()?.type === 'lparen') {
            this.index++;
            const field = this.expectField();
            this.expect('comma', "','");
            const argument = this.next('a string literal');
            if (argument.type !== 'string') {
                throw invalidFilter(`${functionName} expects a string literal`, argument.position);
            }
            this.expect('rparen', "')'");
            return {type: 'function', name: functionName, field, value: argument.value};
        }

        const operatorToken = this.next('a comparison operator');
        const operator = operatorToken.type === 'identifier'
            ? COMPARISON_OPERATORS.find(candidate => candidate === operatorToken.value.toLowerCase())
            : undefined;
        if (!operator) {
            throw invalidFilter(`expected one of ${COMPARISON_OPERATORS.join(', ')}`, operatorToken.position);
        }

        return {type: 'comparison', field: token.value, operator, value: this.parseLiteral()};
    }

    private nested<T>(position: number, parse: () => T): T {
        if (this.depth >= MAX_FILTER_DEPTH) {
            throw invalidFilter('expression nested too deeply', position);
        }
        this.depth++;
        try {
            return parse();
        } finally {
            this.depth--;
        }
    }

    private parseLiteral(): FilterLiteral {
        const token = this.next('a literal');
        switch (token.type) {
            case 'string':
            case 'number':
                return token.value;
            case 'identifier': {
                const keyword = token.value.toLowerCase();
                if (keyword === 'true') return true;
                if (keyword === 'false') return false;
                if (keyword === 'null') return null;
                throw invalidFilter(`unknown literal '${token.value}'`, token.position);
            }
            default:
                throw invalidFilter('expected a literal', token.position);
        }
    }

    private expectField(): string {
        const token = this.next('a field name');
        if (token.type !== 'identifier') {
            throw invalidFilter('expected a field name', token.position);
        }
        return token.value;
    }

    private matchKeyword(keyword: string): boolean {
        const token = this.peek();
        if (token?.type === 'identifier' && token.value.toLowerCase() === keyword) {
            this.index++;
            return true;
        }
        return false;
    }

    private expect(type: 'lparen' | 'rparen' | 'comma', label: string): void {
        const token = this.next(label);
        if (token.type !== type) {
            throw invalidFilter(`expected ${label}`, token.position);
        }
    }

    private peek(): Token | undefined {
        return this.tokens[this.index];
    }

    private next(expected: string): Token {
        const token = this.tokens[this.index];
        if (!token) {
            throw invalidFilter(`expected ${expected} but reached the end`, this.inputLength);
        }
        this.index++;
        return token;
    }
}

export const parseFilter = (input: string): FilterNode =>
    new FilterParser(tokenize(input), input.length).parse();

/**
 * Every field referenced by a filter tree, in order of appearance
 */
export const collectFilterFields = (node: FilterNode): string[] => {
    switch (node.type) {
        case 'comparison':
        case 'function':
            return [node.field];
        case 'and':
        case 'or':
            return [...collectFilterFields(node.left), ...collectFilterFields(node.right)];
        case 'not':
            return collectFilterFields(node.operand);
    }
};
