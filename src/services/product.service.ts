// src/services/product.service.ts

import type {EntityService} from '../interfaces/entity.interface';
import type {Product, ProductInput, ProductView} from '../interfaces/product.interface';
import {DuplicateSkuError} from '../utils/errors.util';
import {logger} from '../utils/logger.util';

/**
 * Product rules on top of any product store: unique SKUs and server-managed timestamps.
 *
 * Writes through one instance run one at a time, so a SKU check and the write it
 * guards cannot interleave with another write. Stores shared between processes
 * enforce the SKU rule themselves (see FirestoreProductRepository).
 */
export class ProductService implements EntityService<Product> {
    private writeQueue: Promise<unknown> = Promise.resolve();

    constructor(
        private readonly repository: EntityService<Product>,
        private readonly now: () => Date = () => new Date()
    ) {}

    add(entity: Product): Promise<Product> {
        return this.exclusive(async () => {
            await this.assertSkuAvailable(entity.sku);

            const timestamp = this.now().toISOString();
            const created = await this.repository.add({...entity, createdAt: timestamp, updatedAt: timestamp});

            logger.info(`Product created: ${created.id}`, {sku: created.sku});
            return created;
        });
    }

    update(entity: Product): Promise<Product> {
        return this.exclusive(async () => {
            const existing = await this.repository.get(entity.id);
            await this.assertSkuAvailable(entity.sku, entity.id);

            const updated = await this.repository.update({
                ...entity,
                createdAt: existing.createdAt,
                updatedAt: this.now().toISOString(),
            });

            logger.info(`Product updated: ${updated.id}`, {sku: updated.sku});
            return updated;
        });
    }

    get(id: number): Promise<Product> {
        return this.repository.get(id);
    }

    getAll(): Promise<Product[]> {
        return this.repository.getAll();
    }

    delete(entity: Product): Promise<void> {
        return this.exclusive(async () => {
            await this.repository.delete(entity);
            logger.info(`Product deleted: ${entity.id}`);
        });
    }

    create(input: ProductInput): Promise<Product> {
        return this.add({...input, id: 0, createdAt: '', updatedAt: ''});
    }

    replace(id: number, input: ProductInput): Promise<Product> {
        return this.update({...input, id, createdAt: '', updatedAt: ''});
    }

    async remove(id: number): Promise<void> {
        const product = await this.repository.get(id);
        await this.delete(product);
    }

    // Queues `work` behind every earlier write; the caller still sees its own rejection
    private exclusive<R>(work: () => Promise<R>): Promise<R> {
        const run = this.writeQueue.then(work);
        this.writeQueue = run.catch(() => undefined);
        return run;
    }

    private async assertSkuAvailable(sku: string, ownerId?: number): Promise<void> {
        const products = await this.repository.getAll();
        const conflict = products.find(product => product.sku === sku && product.id !== ownerId);

        if (conflict) {
            throw new DuplicateSkuError(sku, conflict.id);
        }
    }
}

export const toProductView = (product: Product): ProductView => ({
    id: product.id,
    sku: product.sku,
    name: product.name,
    category: product.category,
    price: product.price,
    inStock: product.stock > 0,
    active: product.active,
});

export const PRODUCT_VIEW_COLUMNS: readonly (keyof ProductView)[] = ['id', 'sku', 'name', 'category', 'price', 'inStock', 'active'];

/** Fields a product list may filter and sort on */
export const PRODUCT_QUERY_FIELDS: readonly (keyof Product)[] = [
    'id', 'sku', 'name', 'category', 'price', 'stock', 'active', 'createdAt', 'updatedAt',
];
