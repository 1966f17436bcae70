import { Request, Response, NextFunction } from 'express';
import { APIErrorCodes } from '../interfaces/api.interface';
import { requestOutcomeHandler } from '../services/request-outcome.service';
import { BusinessError, describeError } from '../utils/errors.util';
import { logger } from '../utils/logger.util';

// Shape of errors raised by express and body-parser (http-errors)
const clientStatusOf = (err: unknown): number | undefined => {
    if (typeof err !== 'object' || err === null) return undefined;
    const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

/**
 * Last-resort conversion for failures raised outside the outcome handler
 * (malformed JSON bodies, oversized payloads, handlers that forgot to catch).
 */
export const errorHandler = (
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
): void => {
    if (res.headersSent) {
        next(err);
        return;
    }

    logger.error('Unhandled error:', {
        error: describeError(err),
        url: req.url,
        method: req.method,
        ip: req.ip,
        userAgent: req.get('User-Agent')
    });

    const clientStatus = clientStatusOf(err);
    requestOutcomeHandler.handleFailure(
        res,
        clientStatus !== undefined
            ? new BusinessError(APIErrorCodes.BAD_REQUEST, describeError(err), { status: clientStatus })
            : err
    );
};

export const notFoundHandler = (req: Request, res: Response): void => {
    logger.warn('404 Not Found:', {
        url: req.url,
        method: req.method,
        ip: req.ip
    });

    res.status(404).json({
        kind: 'business',
        code: APIErrorCodes.NOT_FOUND,
        message: 'Endpoint not found',
        details: {
            method: req.method,
            path: req.path,
            availableEndpoints: {
                health: '/health',
                products: '/api/v1/products'
            }
        }
    });
};
