import { describe, expect, it, vi } from 'vitest';
import { HTTPResponse } from './http_writer';
import { dispatchResource, jsonSerializer, Resource, ResourceReply, resourceMethods } from './resource';
import { ByteSink, HTTPMethod, HTTPRequest, Serializer } from './types';

class MemorySink implements ByteSink {
    readonly history: string[] = [];
    async write(data: Buffer | string): Promise<void> {
        this.history.push(typeof data === 'string' ? data : data.toString('utf8'));
    }
}

function request(method: HTTPMethod, opts: Partial<HTTPRequest> = {}): HTTPRequest {
    return {
        method,
        path: '/user/5',
        queryString: '',
        version: '1.0',
        headers: new Map(),
        body: Buffer.alloc(0),
        params: { id: '5' },
        signal: new AbortController().signal,
        ...opts,
    };
}

async function dispatch(resource: Resource, req: HTTPRequest, serializer: Serializer = jsonSerializer, debug = false) {
    const sink = new MemorySink();
    const res = new HTTPResponse(sink);
    await dispatchResource(resource, req, res, { serializer, debug });
    return { sink, res };
}

describe('resourceMethods', () => {
    it('lists the capabilities a resource implements', () => {
        expect(resourceMethods({ get: () => 1 })).toEqual(['GET']);
        expect(resourceMethods({ delete: () => 1, post: () => 1 })).toEqual(['POST', 'DELETE']);
        expect(resourceMethods({})).toEqual([]);
    });
});

describe('dispatchResource', () => {
    it('serializes a plain value with status 200 in a single body write', async () => {
        const get = vi.fn(() => ({ id: 5, name: 'Alex' }));
        const { sink, res } = await dispatch({ get }, request('GET', { queryString: 'verbose=1' }));

        expect(get).toHaveBeenCalledWith({ verbose: '1' }, { id: '5' }, expect.objectContaining({ path: '/user/5' }));
        expect(res.code).toBe(200);
        expect(sink.history).toEqual([
            'HTTP/1.1 200 OK\r\n' +
                'Content-Type: application/json\r\n' +
                'Content-Length: 22\r\n' +
                'Connection: close\r\n\r\n',
            '{"id":5,"name":"Alex"}',
        ]);
    });

    it('uses the status of a ResourceReply', async () => {
        const post = vi.fn(async (data: Record<string, unknown>) => new ResourceReply({ created: data.name }, 201));
        const req = request('POST', {
            headers: new Map([['content-type', 'application/x-www-form-urlencoded']]),
            body: Buffer.from('name=Maggie'),
        });
        const { sink } = await dispatch({ post }, req);

        expect(sink.history[0]).toMatch(/^HTTP\/1\.1 201 Created\r\n/);
        expect(sink.history[1]).toBe('{"created":"Maggie"}');
    });

    it('answers 405 without calling anything for a missing capability', async () => {
        const get = vi.fn(() => ({}));
        const { sink } = await dispatch({ get }, request('DELETE'));

        expect(get).not.toHaveBeenCalled();
        expect(sink.history[0]).toBe('HTTP/1.0 405 Method Not Allowed\r\nContent-Type: text/plain\r\nContent-Length: 29\r\nConnection: close\r\n\r\n');
    });

    it('answers 405 for methods outside GET/POST/PUT/DELETE', async () => {
        const { sink } = await dispatch({ get: () => ({}) }, request('PATCH'));
        expect(sink.history[0]).toMatch(/^HTTP\/1\.0 405 /);
    });

    it('turns a serialization failure into a generic 500', async () => {
        const cyclic: Record<string, unknown> = {};
        cyclic.self = cyclic;
        const { sink, res } = await dispatch({ get: () => cyclic }, request('GET'));

        expect(res.code).toBe(500);
        expect(sink.history).toEqual([
            'HTTP/1.1 500 Internal Server Error\r\n' +
                'Content-Type: text/plain\r\n' +
                'Content-Length: 21\r\n' +
                'Connection: close\r\n\r\n',
            'Internal Server Error',
        ]);
    });

    it('includes the failure in the 500 body in debug mode', async () => {
        const failing: Serializer = {
            contentType: 'application/json',
            serialize: () => {
                throw new Error('cannot encode');
            },
        };
        const { sink } = await dispatch({ get: () => ({}) }, request('GET'), failing, true);

        expect(sink.history[1]).toMatch(/^Internal Server Error: Error: cannot encode\n/);
    });

    it('treats a missing result as a failure', async () => {
        const { res, sink } = await dispatch({ put: () => undefined }, request('PUT'));

        expect(res.code).toBe(500);
        expect(sink.history[1]).toBe('Internal Server Error');
    });

    it('lets errors thrown by the resource propagate', async () => {
        const boom = new Error('db down');
        await expect(dispatch({ get: () => { throw boom; } }, request('GET'))).rejects.toBe(boom);
    });
});
