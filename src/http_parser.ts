// src/http_parser.ts

import { ByteReader, HTTPError, HTTPMethod, isHTTPMethod } from './types';

export const MAX_LINE_LENGTH = 1024;
export const MAX_HEADERS = 64;

// Headers every request keeps regardless of the route's policy:
// the body reader and the form decoder depend on them.
const ALWAYS_SAVED = new Set(['content-length', 'content-type']);
const BODY_METHODS = new Set<HTTPMethod>(['POST', 'PUT', 'PATCH', 'DELETE']);

export interface RequestLine {
    method: HTTPMethod;
    path: string;
    queryString: string;
    version: string;
}

export interface HeaderPolicy {
    parseHeaders: boolean;
    saveHeaders: ReadonlySet<string>;
}

// METHOD SP PATH[?QUERY] SP VERSION
export async function readRequestLine(reader: ByteReader): Promise<RequestLine> {
    let line = '';
    while (line === '') {
        try {
            line = await reader.readLine(MAX_LINE_LENGTH);
        } catch (e) {
            // An overlong request line is a bad request, not a header problem.
            if (e instanceof HTTPError && e.statusCode === 431) {
                throw new HTTPError(400, 'Request line too long');
            }
            throw e;
        }
    }
    return parseRequestLine(line);
}

export function parseRequestLine(line: string): RequestLine {
    const parts = line.trim().split(/\s+/);
    if (parts.length !== 3) {
        throw new HTTPError(400, 'Malformed request line');
    }
    const [method, target, version] = parts;
    if (!isHTTPMethod(method)) {
        throw new HTTPError(400, `Unsupported method ${method}`);
    }
    if (!/^HTTP\/\d\.\d$/.test(version)) {
        throw new HTTPError(400, 'Malformed HTTP version');
    }
    if (!target.startsWith('/')) {
        throw new HTTPError(400, 'Malformed request target');
    }
    const q = target.indexOf('?');
    return {
        method,
        path: q === -1 ? target : target.substring(0, q),
        queryString: q === -1 ? '' : target.substring(q + 1),
        version: version.substring('HTTP/'.length),
    };
}

// Reads header lines up to the empty line, keeping only what the policy allows.
export async function readHeaders(reader: ByteReader, policy: HeaderPolicy): Promise<Map<string, string>> {
    const headers = new Map<string, string>();
    for (let count = 0; ; count++) {
        const line = await reader.readLine(MAX_LINE_LENGTH);
        if (line === '') {
            return headers;
        }
        if (count >= MAX_HEADERS) {
            throw new HTTPError(431, 'Too many headers');
        }
        const index = line.indexOf(':');
        if (index <= 0) {
            throw new HTTPError(400, 'Malformed header');
        }
        const key = line.substring(0, index).trim().toLowerCase();
        if (key === '') {
            throw new HTTPError(400, 'Malformed header');
        }
        if (policy.parseHeaders || ALWAYS_SAVED.has(key) || policy.saveHeaders.has(key)) {
            headers.set(key, line.substring(index + 1).trim());
        }
    }
}

// Reads a Content-Length delimited body. The limit is checked before
// any body byte is consumed.
export async function readBody(
    reader: ByteReader,
    method: HTTPMethod,
    headers: Map<string, string>,
    maxBodySize: number,
): Promise<Buffer> {
    const contentLengthStr = headers.get('content-length');
    if (!BODY_METHODS.has(method) || contentLengthStr === undefined) {
        return Buffer.alloc(0);
    }
    if (!/^\d+$/.test(contentLengthStr)) {
        throw new HTTPError(400, 'Invalid Content-Length');
    }
    const contentLength = parseInt(contentLengthStr, 10);
    if (contentLength > maxBodySize) {
        throw new HTTPError(413, 'Payload too large');
    }
    if (contentLength === 0) {
        return Buffer.alloc(0);
    }
    return reader.readExactly(contentLength);
}
