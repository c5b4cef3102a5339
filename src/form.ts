// src/form.ts

import { HTTPError, HTTPRequest } from './types';

function isHexDigit(code: number): boolean {
    return (code >= 0x30 && code <= 0x39) || (code >= 0x41 && code <= 0x46) || (code >= 0x61 && code <= 0x66);
}

// Decodes application/x-www-form-urlencoded text: '+' is a space,
// %XX is a byte. Broken escapes are kept as-is.
export function urlDecodePlus(value: string): string {
    const src = Buffer.from(value.replace(/\+/g, ' '), 'utf8');
    const out = Buffer.alloc(src.length);
    let n = 0;
    for (let i = 0; i < src.length; i++) {
        if (src[i] === 0x25 && i + 2 < src.length && isHexDigit(src[i + 1]) && isHexDigit(src[i + 2])) {
            out[n++] = parseInt(src.toString('latin1', i + 1, i + 3), 16);
            i += 2;
        } else {
            out[n++] = src[i];
        }
    }
    return out.toString('utf8', 0, n);
}

export function parseQueryString(qs: string): Record<string, string> {
    const result: Record<string, string> = {};
    if (!qs) return result;
    for (const pair of qs.split('&')) {
        if (pair === '') continue;
        const eqIdx = pair.indexOf('=');
        if (eqIdx < 0) {
            result[urlDecodePlus(pair)] = '';
            continue;
        }
        result[urlDecodePlus(pair.slice(0, eqIdx))] = urlDecodePlus(pair.slice(eqIdx + 1));
    }
    return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Decodes the request body according to its Content-Type.
export function parseFormData(req: HTTPRequest): Record<string, unknown> {
    if (req.body.length === 0) return {};
    const contentType = (req.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
    if (contentType === 'application/x-www-form-urlencoded') {
        return parseQueryString(req.body.toString('utf8'));
    }
    if (contentType === 'application/json') {
        let parsed: unknown;
        try {
            parsed = JSON.parse(req.body.toString('utf8'));
        } catch {
            throw new HTTPError(400, 'Malformed JSON body');
        }
        if (!isPlainObject(parsed)) {
            throw new HTTPError(400, 'JSON body must be an object');
        }
        return parsed;
    }
    return {};
}
