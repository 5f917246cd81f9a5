import { Writable } from 'node:stream';
import { HeaderMap } from './headers';
import { reasonPhrase, Response } from './response';

export interface ResponseWriter {
    readonly stream: Writable;
    write: (response: Response) => Promise<void>;
}

/**
 * Headers as they go out: the caller's, in order, plus a Content-Length
 * derived from the body when the caller did not set one.
 */
export function finalizeHeaders(response: Response): HeaderMap {
    const headers = new HeaderMap(response.headers);
    // The status line comes from response.status only.
    headers.delete('status');
    if (!headers.has('content-length')) {
        headers.set('Content-Length', String(response.body.byteLength));
    }
    return headers;
}

export function serializeHead(response: Response): Buffer {
    const { status } = response;
    const lines = [`Status: ${status} ${reasonPhrase(status)}`];
    for (const [name, value] of finalizeHeaders(response)) {
        lines.push(`${name}: ${value}`);
    }
    lines.push('', '');
    return Buffer.from(lines.join('\r\n'));
}

export function serializeResponse(response: Response): Buffer {
    return Buffer.concat([serializeHead(response), response.body]);
}

class ResponseWriterImpl implements ResponseWriter {
    stream: Writable;

    constructor(stream: Writable) {
        this.stream = stream;
    }

    write(response: Response): Promise<void> {
        const output = serializeResponse(response);

        return new Promise((resolve, reject) => {
            let settled = false;

            const done = (err?: Error | null) => {
                if (settled) return;
                settled = true;

                if (err) {
                    // Left in place: the stream reports this failure again
                    // as an 'error' event.
                    const message = `ResponseWriter::write: cannot write response: ${err.message}`;
                    reject(new Error(message, { cause: err }));
                } else {
                    this.stream.removeListener('error', done);
                    resolve();
                }
            };

            this.stream.once('error', done);
            try {
                this.stream.write(output, done);
            } catch (err) {
                done(err instanceof Error ? err : new Error(String(err)));
            }
        });
    }
}

export function createResponseWriter(stream: Writable): ResponseWriter {
    return new ResponseWriterImpl(stream);
}
