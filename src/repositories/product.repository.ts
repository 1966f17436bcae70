import type {Product} from '../interfaces/product.interface';
import {zProduct} from '../schemas/product.schema';
import {DuplicateSkuError} from '../utils/errors.util';
import {BaseFirestoreRepository} from './base.repository';

export class FirestoreProductRepository extends BaseFirestoreRepository<Product> {
    constructor() {
        super('products', 'Product', zProduct, [
            {
                collection: '_skus',
                valueOf: product => product.sku,
                conflict: (sku, productId) => new DuplicateSkuError(sku, productId),
            },
        ]);
    }
}
