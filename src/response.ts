import { STATUS_CODES } from 'node:http';
import { unknownReason } from './constants';
import { HeaderInit, HeaderMap } from './headers';

export interface Response {
    status: number;
    headers: HeaderMap;
    body: Buffer;
}

export type ResponseBody = string | Buffer | Uint8Array;

function toBuffer(body: ResponseBody): Buffer {
    if (typeof body === 'string') return Buffer.from(body);
    if (Buffer.isBuffer(body)) return body;
    return Buffer.from(body.buffer, body.byteOffset, body.byteLength);
}

export function reasonPhrase(status: number): string {
    return STATUS_CODES[status] ?? unknownReason;
}

export function createResponse(
    status: number,
    headers: HeaderInit = {},
    body: ResponseBody = Buffer.alloc(0)
): Response {
    return {
        status,
        headers: new HeaderMap(headers),
        body: toBuffer(body),
    };
}

function sized(
    status: number,
    body: ResponseBody,
    contentType?: string
): Response {
    const buffer = toBuffer(body);
    const headers = new HeaderMap();
    if (contentType) headers.set('Content-Type', contentType);
    headers.set('Content-Length', String(buffer.byteLength));
    return { status, headers, body: buffer };
}

// A response with no body, e.g. `emptyResponse(404)`.
export function emptyResponse(status: number): Response {
    return sized(status, Buffer.alloc(0));
}

export function textResponse(status: number, text: string): Response {
    return sized(status, text, 'text/plain; charset=utf-8');
}

export function htmlResponse(status: number, html: string): Response {
    return sized(status, html, 'text/html; charset=utf-8');
}

export function jsonResponse(status: number, value: unknown): Response {
    return sized(
        status,
        JSON.stringify(value) ?? 'null',
        'application/json; charset=utf-8'
    );
}

export function binaryResponse(
    status: number,
    body: Buffer | Uint8Array
): Response {
    return sized(status, body);
}
