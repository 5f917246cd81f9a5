import {
    NextFunction,
    Request as ExpressRequest,
    Response as ExpressResponse,
} from 'express';
import { Readable } from 'node:stream';
import { defaultErrorStatus, headerPrefix } from './constants';
import {
    FallibleHandler,
    Handler,
    invokeFallible,
    invokeHandler,
    Invoke,
} from './dispatcher';
import { Params } from './headers';
import { Environment } from './options';
import { buildRequest } from './request';
import { Response } from './response';
import { finalizeHeaders } from './writer';

export type IncomingRequest = Readable &
    Pick<
        ExpressRequest,
        'method' | 'originalUrl' | 'httpVersion' | 'headers' | 'ip'
    >;

export type ResponseSink = Pick<ExpressResponse, 'statusCode'> & {
    setHeader(name: string, value: string): unknown;
    end(body: Buffer): unknown;
};

// Assignable to express' RequestHandler, so it can be passed to `app.use`.
export type CgiMiddleware = (
    req: IncomingRequest,
    res: ResponseSink,
    next: NextFunction
) => Promise<void>;

/**
 * The environment a CGI host would have set up for this request.
 */
export function requestToEnv(req: IncomingRequest): Environment {
    const url = new URL(req.originalUrl, 'http://localhost');
    const env: Params = {
        GATEWAY_INTERFACE: 'CGI/1.1',
        REQUEST_METHOD: req.method,
        REQUEST_URI: req.originalUrl,
        QUERY_STRING: url.search.substring(1),
        SERVER_PROTOCOL: `HTTP/${req.httpVersion}`,
    };
    if (req.ip) env.REMOTE_ADDR = req.ip;

    for (const header in req.headers) {
        const value = req.headers[header];
        if (value === undefined) continue;

        const joined = Array.isArray(value) ? value.join(', ') : value;
        const name = header.toLowerCase();
        if (name === 'content-type') {
            env.CONTENT_TYPE = joined;
        } else if (name === 'content-length') {
            env.CONTENT_LENGTH = joined;
        } else {
            const variable = name.toUpperCase().replaceAll('-', '_');
            env[headerPrefix + variable] = joined;
        }
    }
    return env;
}

export function sendResponse(res: ResponseSink, response: Response): void {
    res.statusCode = response.status;
    for (const [name, value] of finalizeHeaders(response)) {
        res.setHeader(name, value);
    }
    res.end(response.body);
}

function middleware(invoke: Invoke): CgiMiddleware {
    return async (req, res, next) => {
        try {
            const request = await buildRequest(requestToEnv(req), req);
            sendResponse(res, await invoke(request));
        } catch (err) {
            next(err);
        }
    };
}

export function cgi(handler: Handler): CgiMiddleware {
    return middleware(invokeHandler(handler));
}

export function cgiFallible(
    handler: FallibleHandler,
    errorStatus: number = defaultErrorStatus
): CgiMiddleware {
    return middleware(invokeFallible(handler, errorStatus));
}
