// src/index.ts

export { WebServer } from './server';
export type { WebServerOptions, ResourceOptions } from './server';
export { HTTPResponse, reasonPhrase, DEFAULT_MAX_AGE, FILE_CHUNK_SIZE } from './http_writer';
export type { ResponseState, SendFileOptions } from './http_writer';
export { ResourceReply, jsonSerializer } from './resource';
export type { Resource, ResourceData, ResourceMethod } from './resource';
export { RouteTable } from './router';
export type { Route, Resolution } from './router';
export { loadConfig, ServerConfigSchema, RouteOptionsSchema } from './config';
export type { ServerConfig, ServerConfigInput, RouteOptionsInput } from './config';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export { parseQueryString, parseFormData, urlDecodePlus } from './form';
export { fsFileProvider, getMimeType } from './static';
export {
    HTTPError,
    InvalidStateError,
    TimeoutError,
    CancelledError,
    ConnectionError,
    HTTP_METHODS,
} from './types';
export type {
    HTTPRequest,
    HTTPMethod,
    Handler,
    AccessControl,
    FileProvider,
    FileStat,
    OpenFile,
    Serializer,
} from './types';
