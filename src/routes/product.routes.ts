// src/routes/product.routes.ts

import { Router } from 'express';
import type { ProductController } from '../controllers/product.controller';

export const createProductRoutes = (controller: ProductController): Router => {
    const router = Router();

    /**
     * @route GET /api/v1/products
     * @desc List products ($filter, $orderby, $top, $skip, $count); CSV with Accept: text/csv
     * @access Public
     */
    router.get('/', controller.listProducts);

    /**
     * @route GET /api/v1/products/:id
     * @desc Get product by ID
     * @access Public
     */
    router.get('/:id', controller.getProduct);

    router.post('/', controller.createProduct);
    router.put('/:id', controller.updateProduct);
    router.delete('/:id', controller.deleteProduct);

    return router;
};
