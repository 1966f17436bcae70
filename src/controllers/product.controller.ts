// src/controllers/product.controller.ts

import type {Request, RequestHandler, Response} from 'express';
import {appConfig} from '../config/app.config';
import {
    PRODUCT_QUERY_FIELDS,
    PRODUCT_VIEW_COLUMNS,
    ProductService,
    toProductView,
} from '../services/product.service';
import {RequestOutcomeHandler, requestOutcomeHandler} from '../services/request-outcome.service';
import {zEntityId, zProductInput} from '../schemas/product.schema';
import {parseQueryOptions} from '../utils/query-options.util';
import {validateInput} from '../utils/validation.util';

export interface ProductController {
    listProducts: RequestHandler;
    getProduct: RequestHandler;
    createProduct: RequestHandler;
    updateProduct: RequestHandler;
    deleteProduct: RequestHandler;
}

export interface ProductControllerOptions {
    outcomes?: RequestOutcomeHandler;
    maxPageSize?: number;
}

export const createProductController = (
    products: ProductService,
    {outcomes = requestOutcomeHandler, maxPageSize = appConfig.query.maxPageSize}: ProductControllerOptions = {}
): ProductController => {
    /**
     * List products as a page of views, or as a CSV export when text/csv is accepted
     */
    const listProducts = async (req: Request, res: Response): Promise<void> => {
        await outcomes.handleQuery(
            req,
            res,
            () => products.getAll(),
            () => parseQueryOptions(req.query, {maxPageSize, allowedFields: PRODUCT_QUERY_FIELDS}),
            toProductView,
            {columns: PRODUCT_VIEW_COLUMNS}
        );
    };

    const getProduct = async (req: Request, res: Response): Promise<void> => {
        const id = validateInput(zEntityId, req.params.id);
        if (!id.success) {
            outcomes.handleValidationFailure(res, id.failures.map(failure => ({...failure, field: 'id'})));
            return;
        }

        await outcomes.handleCallback(res, () => products.get(id.data));
    };

    const createProduct = async (req: Request, res: Response): Promise<void> => {
        const input = validateInput(zProductInput, req.body);
        if (!input.success) {
            outcomes.handleValidationFailure(res, input.failures);
            return;
        }

        await outcomes.handleCallback(res, () => products.create(input.data), 201);
    };

    const updateProduct = async (req: Request, res: Response): Promise<void> => {
        const id = validateInput(zEntityId, req.params.id);
        const input = validateInput(zProductInput, req.body);

        if (!id.success || !input.success) {
            outcomes.handleValidationFailure(res, [
                ...(id.success ? [] : id.failures.map(failure => ({...failure, field: 'id'}))),
                ...(input.success ? [] : input.failures),
            ]);
            return;
        }

        await outcomes.handleCallback(res, () => products.replace(id.data, input.data));
    };

    const deleteProduct = async (req: Request, res: Response): Promise<void> => {
        const id = validateInput(zEntityId, req.params.id);
        if (!id.success) {
            outcomes.handleValidationFailure(res, id.failures.map(failure => ({...failure, field: 'id'})));
            return;
        }

        await outcomes.handleCallback(res, () => products.remove(id.data), 204);
    };

    return {listProducts, getProduct, createProduct, updateProduct, deleteProduct};
};
