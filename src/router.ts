// src/router.ts

import { RouteOptionsInput, RouteOptionsSchema } from './config';
import { AccessControl, Handler, HTTP_METHODS, HTTPMethod } from './types';

export type Segment = { kind: 'literal'; value: string } | { kind: 'param'; name: string };

export interface Route {
    readonly pattern: string;
    readonly segments: readonly Segment[];
    readonly handler: Handler;
    readonly methods: ReadonlySet<HTTPMethod>;
    readonly saveHeaders: ReadonlySet<string>;
    readonly parseHeaders: boolean;
    readonly maxBodySize: number;
    readonly accessControl?: AccessControl;
}

export type Resolution =
    | { kind: 'found'; route: Route; params: Record<string, string> }
    | { kind: 'method-not-allowed'; route: Route }
    | { kind: 'not-found' };

const PARAM_SEGMENT = /^<([A-Za-z_][A-Za-z0-9_]*)>$/;

export function compilePattern(pattern: string): Segment[] {
    if (pattern === '') {
        throw new Error('Empty URL is not allowed');
    }
    if (!pattern.startsWith('/')) {
        throw new Error(`URL must start with "/": ${pattern}`);
    }
    if (pattern.includes('?')) {
        throw new Error(`URL must be simple, without query string: ${pattern}`);
    }
    const names = new Set<string>();
    return pattern.split('/').slice(1).map((part): Segment => {
        const m = PARAM_SEGMENT.exec(part);
        if (m) {
            if (names.has(m[1])) {
                throw new Error(`Duplicate parameter <${m[1]}> in ${pattern}`);
            }
            names.add(m[1]);
            return { kind: 'param', name: m[1] };
        }
        if (part.includes('<') || part.includes('>')) {
            throw new Error(`Malformed parameter in ${pattern}`);
        }
        return { kind: 'literal', value: part };
    });
}

// Binds path segments against a compiled pattern, or returns null.
export function matchSegments(segments: readonly Segment[], path: string): Record<string, string> | null {
    if (!path.startsWith('/')) return null;
    const parts = path.split('/').slice(1);
    if (parts.length !== segments.length) return null;
    const params: Record<string, string> = {};
    for (let i = 0; i < segments.length; i++) {
        const seg = segments[i];
        const part = parts[i];
        if (seg.kind === 'literal') {
            if (seg.value !== part) return null;
        } else {
            if (part === '') return null;
            params[seg.name] = part;
        }
    }
    return params;
}

// Patterns that differ only in parameter names match the same paths.
function sameShape(a: readonly Segment[], b: readonly Segment[]): boolean {
    if (a.length !== b.length) return false;
    return a.every((seg, i) => {
        const other = b[i];
        if (seg.kind === 'param') return other.kind === 'param';
        return other.kind === 'literal' && other.value === seg.value;
    });
}

// Append-only list of routes, matched in registration order.
export class RouteTable {
    private readonly routes: Route[] = [];
    private fallback: Route | undefined;
    private sealed = false;

    private assertOpen(): void {
        if (this.sealed) {
            throw new Error('Routes cannot be added once the server is running');
        }
    }

    add(pattern: string, handler: Handler, options: RouteOptionsInput = {}): Route {
        this.assertOpen();
        const segments = compilePattern(pattern);
        if (this.routes.some((r) => sameShape(r.segments, segments))) {
            throw new Error(`URL already exists: ${pattern}`);
        }
        const route = buildRoute(pattern, segments, handler, options);
        this.routes.push(route);
        return route;
    }

    // Handler for paths no route matches; it accepts every method.
    setCatchAll(handler: Handler, options: Omit<RouteOptionsInput, 'methods'> = {}): Route {
        this.assertOpen();
        this.fallback = buildRoute('*', [], handler, { ...options, methods: [...HTTP_METHODS] });
        return this.fallback;
    }

    seal(): void {
        this.sealed = true;
    }

    get size(): number {
        return this.routes.length;
    }

    resolve(method: HTTPMethod, path: string): Resolution {
        for (const route of this.routes) {
            const params = matchSegments(route.segments, path);
            if (params === null) continue;
            if (!route.methods.has(method)) {
                return { kind: 'method-not-allowed', route };
            }
            return { kind: 'found', route, params };
        }
        if (this.fallback) {
            return { kind: 'found', route: this.fallback, params: {} };
        }
        return { kind: 'not-found' };
    }
}

function buildRoute(pattern: string, segments: Segment[], handler: Handler, options: RouteOptionsInput): Route {
    const opts = RouteOptionsSchema.parse(options);
    return Object.freeze({
        pattern,
        segments: Object.freeze(segments),
        handler,
        methods: new Set(opts.methods),
        saveHeaders: new Set(opts.saveHeaders.map((h) => h.toLowerCase())),
        parseHeaders: opts.parseHeaders,
        maxBodySize: opts.maxBodySize,
        accessControl: opts.accessControl,
    });
}
