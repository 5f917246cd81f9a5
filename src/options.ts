import { Readable, Writable } from 'node:stream';
import { debugVariable, defaultErrorStatus } from './constants';

export type Environment = Readonly<{ [name: string]: string | undefined }>;

export type IOOptions = {
    env?: Environment;
    stdin?: Readable;
    stdout?: Writable;
    exit?: (code: number) => void;
};

export type DispatchOptions = IOOptions & {
    debug?: boolean;
    errorStatus?: number;
};

export type ResolvedOptions = Required<DispatchOptions>;

export function snapshotEnv(env: Environment = process.env): Environment {
    return Object.freeze({ ...env });
}

export function debugEnabled(env: Environment): boolean {
    const value = env[debugVariable];
    return value === '1' || value === 'true';
}

export function resolveOptions(options: DispatchOptions = {}): ResolvedOptions {
    const env = options.env ?? snapshotEnv();

    return {
        env,
        stdin: options.stdin ?? process.stdin,
        stdout: options.stdout ?? process.stdout,
        exit: options.exit ?? ((code: number) => process.exit(code)),
        debug: options.debug ?? debugEnabled(env),
        errorStatus: options.errorStatus ?? defaultErrorStatus,
    };
}
