// src/services/request-outcome.service.ts

import type {Request, Response} from 'express';
import {appConfig} from '../config/app.config';
import type {CsvExportOptions, PageResult, ValidationFailure} from '../interfaces/api.interface';
import type {Outcome} from '../interfaces/outcome.interface';
import {ok} from '../interfaces/outcome.interface';
import type {QueryOptions} from '../interfaces/query.interface';
import {acceptsMediaType} from '../utils/content-negotiation.util';
import {buildExportFileName, CSV_MEDIA_TYPE, DEFAULT_CSV_DELIMITER, toCsv} from '../utils/csv.util';
import {classifyFailure} from '../utils/errors.util';
import {logger} from '../utils/logger.util';
import {applyQueryOptions} from '../utils/query-engine.util';
import {buildNextPageLink} from '../utils/query-options.util';

export type QuerySource<O> = Iterable<O> | (() => Iterable<O> | Promise<Iterable<O>>);

export type QueryOptionsSource = QueryOptions | (() => QueryOptions);

export type Projection<O, R> = (item: O) => R;

export interface RequestOutcomeHandlerOptions {
    now?: () => Date;
    exposeInternalErrors?: boolean;
    csvDelimiter?: string;
}

/**
 * Turns the outcome of a unit of work into exactly one HTTP response.
 *
 * Stateless: controllers receive an instance and call it from every handler.
 * Nothing thrown by the work, the query layer or a projection escapes; every
 * failure is classified as a business fault (400) or an internal fault (500).
 */
export class RequestOutcomeHandler {
    private readonly now: () => Date;
    private readonly exposeInternalErrors: boolean;
    private readonly csvDelimiter: string;

    constructor(options: RequestOutcomeHandlerOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.exposeInternalErrors = options.exposeInternalErrors ?? appConfig.errors.exposeInternalErrors;
        this.csvDelimiter = options.csvDelimiter ?? DEFAULT_CSV_DELIMITER;
    }

    /**
     * Run `work` and send its value, or the classified failure
     */
    async handleCallback<S>(res: Response, work: () => S | Promise<S>, successStatus: number = 200): Promise<void> {
        let outcome: Outcome<S>;
        try {
            outcome = ok(await work());
        } catch (error) {
            outcome = this.classify(error);
        }

        try {
            this.handleOutcome(res, outcome, successStatus);
        } catch (error) {
            this.handleSendFailure(res, error);
        }
    }

    handleOutcome<S>(res: Response, outcome: Outcome<S>, successStatus: number = 200): void {
        switch (outcome.kind) {
            case 'ok':
                if (outcome.value === undefined) {
                    res.status(successStatus).end();
                } else {
                    res.status(successStatus).json(outcome.value);
                }
                return;
            case 'business_fault':
                logger.warn(`Business fault: ${outcome.payload.code}`, {message: outcome.payload.message});
                res.status(400).json(outcome.payload);
                return;
            case 'internal_fault':
                logger.error('Internal fault while handling request', outcome.cause);
                res.status(500).json(outcome.payload);
                return;
            default: {
                const unreachable: never = outcome;
                throw new Error(`Unhandled outcome ${JSON.stringify(unreachable)}`);
            }
        }
    }

    /**
     * Single entry point for list endpoints: CSV attachment when the client
     * asks for text/csv, a paged JSON result otherwise.
     */
    async handleQuery<O, R extends object>(
        req: Request,
        res: Response,
        source: QuerySource<O>,
        options: QueryOptionsSource,
        project: Projection<O, R>,
        csv: CsvExportOptions = {}
    ): Promise<void> {
        try {
            const items = typeof source === 'function' ? await source() : source;
            const queryOptions = typeof options === 'function' ? options() : options;

            if (acceptsMediaType(req.get('Accept'), CSV_MEDIA_TYPE)) {
                await this.handleCsvFile(res, items, queryOptions, project, csv);
                return;
            }

            this.handleOutcome(res, ok(this.handlePageResult(req, items, queryOptions, project)));
        } catch (error) {
            this.handleSendFailure(res, error);
        }
    }

    /**
     * Apply the options once, then project the materialized page
     */
    handlePageResult<O, R>(req: Request, source: Iterable<O>, options: QueryOptions, project: Projection<O, R>): PageResult<R> {
        const applied = applyQueryOptions(source, options);
        const items = applied.items.map(project);
        const requestUrl = `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`;

        return {
            items,
            nextPageLink: buildNextPageLink(requestUrl, options, items.length, applied.hasMore),
            count: options.count ? applied.totalCount : null,
        };
    }

    handleFailure(res: Response, error: unknown): void {
        this.handleOutcome(res, this.classify(error));
    }

    handleValidationFailure(res: Response, failures: readonly ValidationFailure[]): void {
        logger.debug('Validation failed', {fields: failures.map(failure => failure.field)});
        res.status(400).json(failures);
    }

    // A value that cannot be sent (e.g. one JSON cannot serialize) still gets a response
    private handleSendFailure(res: Response, error: unknown): void {
        if (res.headersSent) {
            logger.error('Response failed after headers were sent', error);
            return;
        }
        this.handleFailure(res, error);
    }

    private classify(error: unknown): Outcome<never> {
        return classifyFailure(error, {exposeInternalErrors: this.exposeInternalErrors});
    }

    private async handleCsvFile<O, R extends object>(
        res: Response,
        source: Iterable<O>,
        options: QueryOptions,
        project: Projection<O, R>,
        csv: CsvExportOptions
    ): Promise<void> {
        const rows = applyQueryOptions(source, options).items.map(project);
        const document = await toCsv(rows, this.csvDelimiter, csv.columns);
        const body = Buffer.from(document, 'utf8');
        const fileName = buildExportFileName(this.now());

        logger.debug(`Exporting ${rows.length} row(s) to ${fileName}`);

        res.status(200)
            .set({
                'Content-Type': 'application/octet-stream',
                'Content-Disposition': `attachment; filename="${fileName}"`,
            })
            .send(body);
    }
}

export const requestOutcomeHandler = new RequestOutcomeHandler();
