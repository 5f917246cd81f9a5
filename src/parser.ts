import { HeaderMap, isHeaderName } from './headers';
import { Response } from './response';

const separators = ['\r\n\r\n', '\n\n'];

function splitOutput(output: Buffer): [string, Buffer] {
    let found: [number, number] | undefined;
    for (const separator of separators) {
        const index = output.indexOf(separator);
        if (index >= 0 && (found === undefined || index < found[0])) {
            found = [index, separator.length];
        }
    }

    if (!found) return [output.toString(), Buffer.alloc(0)];

    const [index, length] = found;
    return [
        output.subarray(0, index).toString(),
        output.subarray(index + length),
    ];
}

/**
 * Parse the output of a CGI program back into a response.
 *
 * Accepts CRLF as well as bare LF line endings. The status comes from the
 * `Status` header; without one it is 302 for a `Location` redirect and 200
 * otherwise.
 */
export function parseResponse(output: Buffer): Response {
    const [head, body] = splitOutput(output);
    const headers = new HeaderMap();
    let status: number | undefined;

    for (const line of head.split(/\r?\n/)) {
        const colon = line.indexOf(':');
        if (colon <= 0) continue;

        const name = line.substring(0, colon).trim();
        const value = line.substring(colon + 1).trim();
        if (!isHeaderName(name)) continue;

        if (name.toLowerCase() === 'status') {
            const code = parseInt(value, 10);
            if (!isNaN(code)) status = code;
        } else {
            headers.set(name, value);
        }
    }

    if (status === undefined) {
        status = headers.has('location') ? 302 : 200;
    }

    return { status, headers, body };
}
