import {z} from 'zod';

export const zProductInput = z.object({
    sku: z
        .string()
        .trim()
        .regex(/^[A-Z0-9-]{3,32}$/, 'SKU must be 3-32 uppercase letters, digits or dashes'),
    name: z.string().trim().min(1, 'Name is required').max(120),
    category: z.string().trim().min(1, 'Category is required').max(60),
    price: z.number().nonnegative('Price cannot be negative').max(1_000_000),
    stock: z.number().int('Stock must be a whole number').nonnegative('Stock cannot be negative'),
    active: z.boolean().default(true),
}).strict();

export const zProduct = zProductInput.extend({
    id: z.number().int().positive(),
    createdAt: z.string(),
    updatedAt: z.string(),
});

/** Positive integer route parameter */
export const zEntityId = z.coerce.number().int('Id must be an integer').positive('Id must be positive');
