export const defaultMethod = 'GET';
export const defaultProtocol = 'HTTP/1.1';
export const defaultPath = '/';
export const defaultErrorStatus = 500;

export const unknownReason = 'Unknown';

export const debugVariable = 'CGI_SHIM_DEBUG';

export const headerPrefix = 'HTTP_';

// Meta-variables of RFC 3875 section 4.1 and the common server extensions.
export const metaVariables = [
    'AUTH_TYPE',
    'CONTENT_LENGTH',
    'CONTENT_TYPE',
    'GATEWAY_INTERFACE',
    'PATH_INFO',
    'PATH_TRANSLATED',
    'QUERY_STRING',
    'REMOTE_ADDR',
    'REMOTE_HOST',
    'REMOTE_IDENT',
    'REMOTE_USER',
    'REQUEST_METHOD',
    'SCRIPT_NAME',
    'SERVER_NAME',
    'SERVER_PORT',
    'SERVER_PROTOCOL',
    'SERVER_SOFTWARE',
    'REQUEST_URI',
    'DOCUMENT_ROOT',
    'SCRIPT_FILENAME',
] as const;
