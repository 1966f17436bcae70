import type {Entity} from './entity.interface';

export interface Product extends Entity {
    sku: string;
    name: string;
    category: string;
    price: number;
    stock: number;
    active: boolean;
    createdAt: string;
    updatedAt: string;
}

export type ProductInput = Omit<Product, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Response-facing shape of a product
 */
export interface ProductView {
    id: number;
    sku: string;
    name: string;
    category: string;
    price: number;
    inStock: boolean;
    active: boolean;
}
