import { createResponse } from '../src/response';
import { parseResponse } from '../src/parser';
import { serializeResponse } from '../src/writer';

describe('parseResponse', () => {
    test('recovers a serialized response', () => {
        const response = createResponse(
            200,
            { 'Content-Type': 'text/html', 'Cache-Control': 'max-age=3600' },
            '<h1>Hello</h1>'
        );

        const parsed = parseResponse(serializeResponse(response));

        expect(parsed.status).toBe(200);
        expect([...parsed.headers]).toEqual([
            ['Content-Type', 'text/html'],
            ['Cache-Control', 'max-age=3600'],
            ['Content-Length', '14'],
        ]);
        expect(parsed.body.byteLength).toBe(response.body.byteLength);
        expect(parsed.body.toString()).toBe('<h1>Hello</h1>');
    });

    test('a Status header set by the caller does not replace the status', () => {
        const parsed = parseResponse(
            serializeResponse(createResponse(200, { Status: '404' }, 'ok'))
        );

        expect(parsed.status).toBe(200);
        expect(parsed.headers.names()).toEqual(['Content-Length']);
    });

    test('keeps a body that contains blank lines', () => {
        const body = Buffer.from('line 1\r\n\r\nline 2');
        const parsed = parseResponse(
            serializeResponse(createResponse(418, { 'X-Custom': 'val' }, body))
        );

        expect(parsed.status).toBe(418);
        expect(parsed.headers.get('x-custom')).toBe('val');
        expect(parsed.body).toEqual(body);
    });

    test('takes the status from the Status header', () => {
        const parsed = parseResponse(
            Buffer.from('Status: 404 Not Found\r\nContent-Type: text/plain\r\n\r\nnope')
        );

        expect(parsed.status).toBe(404);
        expect(parsed.headers.names()).toEqual(['Content-Type']);
        expect(parsed.body.toString()).toBe('nope');
    });

    test('accepts bare LF', () => {
        const parsed = parseResponse(
            Buffer.from('Content-Type: text/plain\n\nhello')
        );

        expect(parsed.status).toBe(200);
        expect(parsed.headers.get('content-type')).toBe('text/plain');
        expect(parsed.body.toString()).toBe('hello');
    });

    test('Location without Status is a redirect', () => {
        const parsed = parseResponse(Buffer.from('Location: /login\r\n\r\n'));

        expect(parsed.status).toBe(302);
        expect(parsed.headers.get('location')).toBe('/login');
    });

    test('output without a blank line is all header', () => {
        const parsed = parseResponse(Buffer.from('Status: 500'));

        expect(parsed.status).toBe(500);
        expect(parsed.body.byteLength).toBe(0);
    });
});
