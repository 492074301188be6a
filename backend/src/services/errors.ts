/**
 * Error taxonomy for the retrieval engine.
 *
 * TransportFailure and MalformedBlock never leave the engine: they are logged and
 * turned into the fallback path (or a skipped block). An empty extraction is not an
 * error at all, the extractor reports it as `{ ok: false }`.
 * RequestError subclasses reach the caller and carry the HTTP status the server
 * answers with.
 */

export abstract class CatalogError extends Error {
    abstract readonly code: string;
}

export abstract class RequestError extends CatalogError {
    abstract readonly statusCode: number;
}

export class TransportFailure extends CatalogError {
    readonly code = 'TRANSPORT_FAILURE';

    /** HTTP status when the server answered outside 2xx; undefined for network errors and timeouts. */
    constructor(url: string, reason: string, public readonly status?: number) {
        super(`Live fetch of ${url} failed: ${reason}`);
        this.name = 'TransportFailure';
    }
}

export class MalformedBlock extends CatalogError {
    readonly code = 'MALFORMED_BLOCK';

    constructor(reason: string) {
        super(`Skipped product block: ${reason}`);
        this.name = 'MalformedBlock';
    }
}

export class InvalidQueryError extends RequestError {
    readonly code = 'INVALID_QUERY';
    readonly statusCode = 400;

    constructor(message: string) {
        super(message);
        this.name = 'InvalidQueryError';
    }
}

export class NotFoundError extends RequestError {
    readonly code = 'NOT_FOUND';
    readonly statusCode = 404;

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

export class InsufficientInputError extends RequestError {
    readonly code = 'INSUFFICIENT_INPUT';
    readonly statusCode = 422;

    constructor(message: string) {
        super(message);
        this.name = 'InsufficientInputError';
    }
}

export class DivisionUndefinedError extends RequestError {
    readonly code = 'DIVISION_UNDEFINED';
    readonly statusCode = 422;

    constructor(public readonly itemId: string) {
        super(`Cannot compute price/rating value for ${itemId}: rating is 0`);
        this.name = 'DivisionUndefinedError';
    }
}

export function isRequestError(error: unknown): error is RequestError {
    return error instanceof RequestError;
}
