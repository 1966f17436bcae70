import type {ExceptionPayload} from './api.interface';

/**
 * Tagged result of a unit of work, dispatched by the request outcome handler.
 */
export type Outcome<S> =
    | { kind: 'ok'; value: S }
    | { kind: 'business_fault'; payload: ExceptionPayload }
    | { kind: 'internal_fault'; payload: ExceptionPayload; cause: unknown };

export type FaultOutcome = Exclude<Outcome<never>, { kind: 'ok' }>;

export const ok = <S>(value: S): Outcome<S> => ({kind: 'ok', value});

export const businessFault = (payload: ExceptionPayload): FaultOutcome => ({kind: 'business_fault', payload});

export const internalFault = (payload: ExceptionPayload, cause: unknown): FaultOutcome => ({
    kind: 'internal_fault',
    payload,
    cause,
});
