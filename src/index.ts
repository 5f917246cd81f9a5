export { buildRequest, headerNameFromEnv, isCgi, splitTarget } from './request';
export type { Request, BuildOptions } from './request';
export {
    createResponse,
    emptyResponse,
    textResponse,
    htmlResponse,
    jsonResponse,
    binaryResponse,
    reasonPhrase,
} from './response';
export type { Response, ResponseBody } from './response';
export { HeaderMap } from './headers';
export type { HeaderInit, Params } from './headers';
export { ok, fail, toResponse, errorResponse } from './result';
export type { Result, Failure } from './result';
export {
    createResponseWriter,
    serializeResponse,
    finalizeHeaders,
} from './writer';
export type { ResponseWriter } from './writer';
export { parseResponse } from './parser';
export {
    dispatch,
    dispatchFallible,
    handle,
    handleFallible,
} from './dispatcher';
export type { Handler, FallibleHandler } from './dispatcher';
export { snapshotEnv } from './options';
export type { DispatchOptions, Environment } from './options';
export { cgi, cgiFallible, requestToEnv } from './middleware';
export type { CgiMiddleware } from './middleware';
