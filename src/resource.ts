// src/resource.ts

import { parseFormData, parseQueryString } from './form';
import { HTTPResponse } from './http_writer';
import { Handler, HTTPMethod, HTTPRequest, Serializer } from './types';

export type ResourceData = Record<string, unknown>;

// A value together with the status code it should be sent with.
export class ResourceReply<T = unknown> {
    constructor(readonly value: T, readonly status: number) {}
}

export type ResourceResult = unknown;

export type ResourceMethod = (
    data: ResourceData,
    params: Record<string, string>,
    req: HTTPRequest,
) => ResourceResult | Promise<ResourceResult>;

// A REST resource implements any subset of these.
export interface Resource {
    get?: ResourceMethod;
    post?: ResourceMethod;
    put?: ResourceMethod;
    delete?: ResourceMethod;
}

const CAPABILITIES = {
    GET: 'get',
    POST: 'post',
    PUT: 'put',
    DELETE: 'delete',
} as const satisfies Partial<Record<HTTPMethod, keyof Resource>>;

type CapabilityMethod = keyof typeof CAPABILITIES;
const CAPABILITY_METHODS: CapabilityMethod[] = ['GET', 'POST', 'PUT', 'DELETE'];

function isCapabilityMethod(method: HTTPMethod): method is CapabilityMethod {
    return method in CAPABILITIES;
}

export const jsonSerializer: Serializer = {
    contentType: 'application/json',
    serialize(value: unknown): string {
        const out: unknown = JSON.stringify(value);
        if (typeof out !== 'string') {
            throw new TypeError(`Cannot serialize value of type ${typeof value}`);
        }
        return out;
    },
};

export interface DispatchOptions {
    serializer: Serializer;
    debug: boolean;
    onError?: (err: unknown) => void;
}

// Methods a resource can answer, by capability presence.
export function resourceMethods(resource: Resource): HTTPMethod[] {
    return CAPABILITY_METHODS.filter((m) => typeof resource[CAPABILITIES[m]] === 'function');
}

function capabilityFor(resource: Resource, method: HTTPMethod): ResourceMethod | undefined {
    if (!isCapabilityMethod(method)) return undefined;
    return resource[CAPABILITIES[method]];
}

// Query parameters overlaid with the decoded body.
export function resourceData(req: HTTPRequest): ResourceData {
    return { ...parseQueryString(req.queryString), ...parseFormData(req) };
}

async function writeReply(res: HTTPResponse, status: number, contentType: string, body: string): Promise<void> {
    const payload = Buffer.from(body, 'utf8');
    res.setStatus(status);
    res.setVersion('1.1');
    res.setHeader('Content-Type', contentType);
    res.setHeader('Content-Length', String(payload.length));
    res.setHeader('Connection', 'close');
    await res.start();
    await res.send(payload);
}

export async function dispatchResource(
    resource: Resource,
    req: HTTPRequest,
    res: HTTPResponse,
    options: DispatchOptions,
): Promise<void> {
    const capability = capabilityFor(resource, req.method);
    if (!capability) {
        await res.error(405);
        return;
    }
    const data = resourceData(req);
    let result = await capability.call(resource, data, req.params, req);
    let status = 200;
    if (result instanceof ResourceReply) {
        status = result.status;
        result = result.value;
    }
    let body: string;
    try {
        if (result === undefined) {
            throw new TypeError(`Resource ${req.method.toLowerCase()} returned no result`);
        }
        body = options.serializer.serialize(result);
    } catch (err) {
        options.onError?.(err);
        const message = 'Internal Server Error';
        const detail = err instanceof Error ? `${message}: ${err.stack ?? err.message}` : `${message}: ${String(err)}`;
        await writeReply(res, 500, 'text/plain', options.debug ? detail : message);
        return;
    }
    await writeReply(res, status, options.serializer.contentType, body);
}

// Wraps a resource into an ordinary route handler.
export function resourceHandler(resource: Resource, options: DispatchOptions): Handler {
    return (req, res) => dispatchResource(resource, req, res, options);
}
