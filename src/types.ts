// src/types.ts

import type { HTTPResponse } from './http_writer';

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;
export type HTTPMethod = typeof HTTP_METHODS[number];

export function isHTTPMethod(value: string): value is HTTPMethod {
    return (HTTP_METHODS as readonly string[]).includes(value);
}

// Represents a parsed HTTP request.
// Headers hold only what the route's header policy retained.
export interface HTTPRequest {
    method: HTTPMethod;
    path: string;
    queryString: string;
    version: string;
    headers: Map<string, string>;
    body: Buffer;
    params: Record<string, string>;
    // Fires when the request times out or the server shuts down.
    signal: AbortSignal;
}

export type Handler = (req: HTTPRequest, res: HTTPResponse) => Promise<void> | void;

// Anything a handler or the writer needs to answer preflight / CORS requests.
export interface AccessControl {
    origins: string;
    headers: string;
}

// A custom error class for HTTP-specific errors,
// allowing us to send a proper HTTP error response.
export class HTTPError extends Error {
    constructor(public statusCode: number, message: string) {
        super(message);
        this.name = 'HTTPError';
    }
}

// Protocol misuse by handler code, e.g. setting a header after start().
export class InvalidStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidStateError';
    }
}

export class TimeoutError extends Error {
    constructor(message = 'Request timed out') {
        super(message);
        this.name = 'TimeoutError';
    }
}

export class CancelledError extends Error {
    constructor(message = 'Connection cancelled') {
        super(message);
        this.name = 'CancelledError';
    }
}

// Socket-level failure: reset, premature EOF, write after close.
export class ConnectionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConnectionError';
    }
}

// Source of request bytes. Every call is a suspension point.
export interface ByteReader {
    readLine(maxLength: number): Promise<string>;
    readExactly(length: number): Promise<Buffer>;
}

// Destination of response bytes. Resolves once the data is handed to the socket.
export interface ByteSink {
    write(data: Buffer | string): Promise<void>;
}

// Filesystem collaborator used by sendFile.
export interface FileStat {
    size: number;
    isFile: boolean;
}

export interface OpenFile {
    read(buffer: Buffer): Promise<number>;
    close(): Promise<void>;
}

export interface FileProvider {
    stat(path: string): Promise<FileStat | null>;
    open(path: string): Promise<OpenFile>;
}

// Turns a resource's return value into bytes.
export interface Serializer {
    contentType: string;
    serialize(value: unknown): string;
}
