export type Params = { [name: string]: string };

export type HeaderInit = Iterable<readonly [string, string]> | Params;

const tokenPattern = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const lineBreakPattern = /[\r\n]/;

export function isHeaderName(name: string): boolean {
    return tokenPattern.test(name);
}

export function isHeaderValue(value: string): boolean {
    return !lineBreakPattern.test(value);
}

function isEntries(
    init: HeaderInit
): init is Iterable<readonly [string, string]> {
    return Symbol.iterator in init;
}

/**
 * Header mapping with case-insensitive names.
 *
 * The first spelling of a name and its position are kept, so headers are
 * written back in the order the caller added them. Setting an existing name
 * replaces its value in place.
 */
export class HeaderMap implements Iterable<[string, string]> {
    private fields: Map<string, [string, string]> = new Map();

    constructor(init?: HeaderInit) {
        if (!init) return;

        if (isEntries(init)) {
            for (const [name, value] of init) {
                this.set(name, value);
            }
        } else {
            for (const name of Object.keys(init)) {
                this.set(name, init[name]);
            }
        }
    }

    get size(): number {
        return this.fields.size;
    }

    get(name: string): string | undefined {
        return this.fields.get(name.toLowerCase())?.[1];
    }

    has(name: string): boolean {
        return this.fields.has(name.toLowerCase());
    }

    set(name: string, value: string): this {
        if (!isHeaderName(name)) {
            throw new TypeError(`HeaderMap::set: invalid header name: ${name}`);
        }
        if (!isHeaderValue(value)) {
            throw new TypeError(
                `HeaderMap::set: line break in value of header: ${name}`
            );
        }

        const key = name.toLowerCase();
        const field = this.fields.get(key);
        if (field) {
            field[1] = value;
        } else {
            this.fields.set(key, [name, value]);
        }
        return this;
    }

    delete(name: string): boolean {
        return this.fields.delete(name.toLowerCase());
    }

    names(): string[] {
        return [...this.fields.values()].map(([name]) => name);
    }

    *[Symbol.iterator](): Iterator<[string, string]> {
        for (const [name, value] of this.fields.values()) {
            yield [name, value];
        }
    }

    toObject(): Params {
        const params: Params = {};
        for (const [name, value] of this) {
            params[name] = value;
        }
        return params;
    }
}
