import { Readable } from 'node:stream';

export function tick() {
    return new Promise((resolve) => {
        setTimeout(resolve, 17);
    });
}

export function debugLog(debug: boolean, ...args: unknown[]): void {
    // stdout belongs to the response
    if (debug) console.error('cgi:', ...args);
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * Read at most `length` bytes from the stream.
 *
 * Resolves early with what was received when the stream ends, closes or
 * fails, and stops consuming once `length` bytes are in. Bytes past the
 * limit that come in the same chunk are dropped.
 */
export function readAtMost(
    stream: Readable,
    length: number,
    onError: (err: Error) => void = () => {}
): Promise<Buffer> {
    if (stream.readableEnded || stream.destroyed) {
        return Promise.resolve(Buffer.alloc(0));
    }

    return new Promise((resolve) => {
        const chunks: Buffer[] = [];
        let received = 0;

        const finish = () => {
            stream.removeListener('data', onData);
            stream.removeListener('end', finish);
            stream.removeListener('close', finish);
            stream.removeListener('error', fail);
            resolve(Buffer.concat(chunks, received));
        };

        const fail = (err: Error) => {
            onError(err);
            finish();
        };

        const onData = (chunk: Buffer | string) => {
            const buffer =
                typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
            const wanted = length - received;
            const body =
                buffer.byteLength > wanted
                    ? buffer.subarray(0, wanted)
                    : buffer;

            chunks.push(body);
            received += body.byteLength;

            if (received >= length) {
                stream.pause();
                finish();
            }
        };

        stream.on('data', onData);
        stream.once('end', finish);
        // destroy() without an error emits neither 'end' nor 'error'
        stream.once('close', finish);
        stream.once('error', fail);
    });
}
