import { defaultErrorStatus } from './constants';
import { Response, textResponse } from './response';
import { errorMessage } from './utils';

export type Failure = string | Error;

export type Result =
    | { readonly ok: true; readonly response: Response }
    | { readonly ok: false; readonly error: Failure };

export function ok(response: Response): Result {
    return { ok: true, response };
}

export function fail(error: Failure): Result {
    return { ok: false, error };
}

export function errorResponse(
    error: Failure,
    status: number = defaultErrorStatus
): Response {
    return textResponse(status, errorMessage(error));
}

/**
 * A failed result becomes a plain-text response carrying the failure
 * message and `status`.
 */
export function toResponse(
    result: Result,
    status: number = defaultErrorStatus
): Response {
    return result.ok ? result.response : errorResponse(result.error, status);
}
