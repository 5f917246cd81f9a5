import { DispatchOptions, resolveOptions, ResolvedOptions } from './options';
import { buildRequest, isCgi, Request } from './request';
import { Response } from './response';
import { errorResponse, Failure, Result, toResponse } from './result';
import { debugLog, errorMessage } from './utils';
import { createResponseWriter } from './writer';

export type Handler = (request: Request) => Response | Promise<Response>;
export type FallibleHandler = (request: Request) => Result | Promise<Result>;

export type Invoke = (request: Request) => Promise<Response>;

export const exitSuccess = 0;
export const exitWriteFailure = 1;

function asFailure(err: unknown): Failure {
    return err instanceof Error ? err : String(err);
}

async function run(
    invoke: Invoke,
    options: ResolvedOptions
): Promise<number> {
    const { env, stdin, stdout, debug } = options;

    if (!isCgi(env)) {
        debugLog(
            debug,
            'not invoked through CGI, missing variables use defaults'
        );
    }

    const request = await buildRequest(env, stdin, {
        onReadError: (err) =>
            debugLog(debug, 'stdin read failed:', err.message),
    });
    debugLog(debug, 'request:', request.method, request.target);

    const response = await invoke(request);
    debugLog(debug, 'response:', response.status);

    try {
        await createResponseWriter(stdout).write(response);
    } catch (err) {
        console.error('cgi:', errorMessage(err));
        return exitWriteFailure;
    }
    return exitSuccess;
}

export function invokeHandler(handler: Handler): Invoke {
    return async (request) => handler(request);
}

// Failures, thrown or returned, end up as an error response.
export function invokeFallible(
    handler: FallibleHandler,
    errorStatus: number
): Invoke {
    return async (request) => {
        let result: Result;
        try {
            result = await handler(request);
        } catch (err) {
            return errorResponse(asFailure(err), errorStatus);
        }
        return toResponse(result, errorStatus);
    };
}

/**
 * Run one CGI request/response cycle and resolve the process exit code:
 * 0 once the response is written, 1 when it could not be.
 */
export function dispatch(
    handler: Handler,
    options: DispatchOptions = {}
): Promise<number> {
    return run(invokeHandler(handler), resolveOptions(options));
}

export function dispatchFallible(
    handler: FallibleHandler,
    options: DispatchOptions = {}
): Promise<number> {
    const resolved = resolveOptions(options);
    return run(invokeFallible(handler, resolved.errorStatus), resolved);
}

/**
 * Entry point of a CGI program:
 *
 *     handle((request) => textResponse(200, 'Hello'));
 */
export async function handle(
    handler: Handler,
    options: DispatchOptions = {}
): Promise<void> {
    const resolved = resolveOptions(options);
    resolved.exit(await run(invokeHandler(handler), resolved));
}

export async function handleFallible(
    handler: FallibleHandler,
    options: DispatchOptions = {}
): Promise<void> {
    const resolved = resolveOptions(options);
    resolved.exit(
        await run(invokeFallible(handler, resolved.errorStatus), resolved)
    );
}
