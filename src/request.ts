import { Readable } from 'node:stream';
import {
    defaultMethod,
    defaultPath,
    defaultProtocol,
    headerPrefix,
    metaVariables,
} from './constants';
import { HeaderMap, isHeaderName, isHeaderValue, Params } from './headers';
import { Environment } from './options';
import { readAtMost } from './utils';

export interface Request {
    readonly method: string;
    readonly target: string;
    readonly path: string;
    readonly query: string | undefined;
    readonly version: string;
    readonly headers: HeaderMap;
    readonly body: Buffer;
    readonly meta: Readonly<Params>;
}

export type BuildOptions = {
    onReadError?: (err: Error) => void;
};

const contentLengthPattern = /^\d+$/;

// Delivered through CONTENT_TYPE / CONTENT_LENGTH instead.
const reservedHeaders = ['content-type', 'content-length'];

function value(env: Environment, name: string): string | undefined {
    const found = env[name];
    return found === undefined || found === '' ? undefined : found;
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.substring(1).toLowerCase();
}

/**
 * `HTTP_X_CUSTOM` → `X-Custom`. Returns undefined for anything that is not
 * an `HTTP_` variable.
 */
export function headerNameFromEnv(name: string): string | undefined {
    if (!name.startsWith(headerPrefix)) return undefined;

    const parts = name
        .substring(headerPrefix.length)
        .split('_')
        .filter((part) => part.length > 0);
    if (parts.length === 0) return undefined;

    return parts.map(capitalize).join('-');
}

export function isCgi(env: Environment): boolean {
    return value(env, 'GATEWAY_INTERFACE')?.startsWith('CGI/') ?? false;
}

export function parseContentLength(
    raw: string | undefined
): number | undefined {
    if (raw === undefined) return undefined;
    const trimmed = raw.trim();
    if (!contentLengthPattern.test(trimmed)) return undefined;

    const length = Number(trimmed);
    return Number.isSafeInteger(length) ? length : undefined;
}

export function splitTarget(target: string): [string, string | undefined] {
    const index = target.indexOf('?');
    if (index < 0) return [target, undefined];
    return [target.substring(0, index), target.substring(index + 1)];
}

function requestTarget(env: Environment): string {
    let path: string;
    let query = env.QUERY_STRING;

    const uri = value(env, 'REQUEST_URI');
    if (uri !== undefined) {
        const [uriPath, uriQuery] = splitTarget(uri);
        path = uriPath;
        query = query ?? uriQuery;
    } else {
        path = (env.SCRIPT_NAME ?? '') + (env.PATH_INFO ?? '');
    }

    if (path === '') path = defaultPath;
    return query ? `${path}?${query}` : path;
}

function requestHeaders(env: Environment, contentLength?: number): HeaderMap {
    const headers = new HeaderMap();

    for (const name of Object.keys(env)) {
        const raw = env[name];
        const header = headerNameFromEnv(name);
        if (raw === undefined || header === undefined) continue;
        if (reservedHeaders.includes(header.toLowerCase())) continue;
        if (!isHeaderName(header) || !isHeaderValue(raw)) continue;

        headers.set(header, raw.trim());
    }

    const contentType = value(env, 'CONTENT_TYPE')?.trim();
    if (contentType && isHeaderValue(contentType)) {
        headers.set('Content-Type', contentType);
    }
    if (contentLength !== undefined) {
        headers.set('Content-Length', String(contentLength));
    }
    return headers;
}

function requestMeta(env: Environment): Params {
    const meta: Params = {};
    for (const name of metaVariables) {
        const found = value(env, name);
        if (found !== undefined) meta[name] = found;
    }
    return meta;
}

/**
 * Build the request a CGI host handed to this process.
 *
 * Never rejects: missing variables fall back to defaults, and the body is
 * whatever stdin delivers up to the declared CONTENT_LENGTH.
 */
export async function buildRequest(
    env: Environment,
    stdin: Readable,
    options: BuildOptions = {}
): Promise<Request> {
    const contentLength = parseContentLength(env.CONTENT_LENGTH);
    const body =
        contentLength !== undefined && contentLength > 0
            ? await readAtMost(stdin, contentLength, options.onReadError)
            : Buffer.alloc(0);

    const target = requestTarget(env);
    const [path, query] = splitTarget(target);

    return Object.freeze({
        method: value(env, 'REQUEST_METHOD') ?? defaultMethod,
        target,
        path,
        query,
        version: value(env, 'SERVER_PROTOCOL') ?? defaultProtocol,
        headers: requestHeaders(env, contentLength),
        body,
        meta: Object.freeze(requestMeta(env)),
    });
}
