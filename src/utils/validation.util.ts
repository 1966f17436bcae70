import type {z} from 'zod';
import type {ValidationFailure} from '../interfaces/api.interface';

export type ValidationResult<T> =
    | { success: true; data: T }
    | { success: false; failures: ValidationFailure[] };

const valueAtPath = (input: unknown, path: ReadonlyArray<string | number>): unknown => {
    let current: unknown = input;
    for (const segment of path) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Reflect.get(current, segment);
    }
    return current;
};

/**
 * Validate input against a schema, reporting one failure per issue with the rejected value
 */
export const validateInput = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ValidationResult<T> => {
    const parsed = schema.safeParse(input);
    if (parsed.success) {
        return {success: true, data: parsed.data};
    }

    return {
        success: false,
        failures: parsed.error.issues.map(issue => {
            const value = valueAtPath(input, issue.path);
            return {
                field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
                message: issue.message,
                ...(value !== undefined && {value}),
            };
        }),
    };
};
