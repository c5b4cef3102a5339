// src/server.ts

import * as net from 'net';
import { RouteOptionsInput, ServerConfig, ServerConfigInput, ServerConfigSchema } from './config';
import { handleConnection, ServerContext } from './http_handler';
import { createLogger, describeError, Logger } from './logger';
import { jsonSerializer, Resource, resourceHandler, resourceMethods } from './resource';
import { Route, RouteTable } from './router';
import { fsFileProvider } from './static';
import { CancelledError, FileProvider, Handler, Serializer } from './types';

export interface WebServerOptions {
    logger?: Logger;
    files?: FileProvider;
    serializer?: Serializer;
}

export type ResourceOptions = Omit<RouteOptionsInput, 'methods'>;

interface Task {
    controller: AbortController;
    done: Promise<void>;
}

// Accepts connections and runs at most maxConcurrency of them at a time.
// Sockets over the limit wait (paused) in a queue no longer than the
// backlog; beyond that they are dropped.
export class WebServer {
    readonly config: ServerConfig;
    readonly routes = new RouteTable();
    private readonly logger: Logger;
    private readonly files: FileProvider;
    private readonly serializer: Serializer;
    private readonly active = new Set<Task>();
    private readonly pending: net.Socket[] = [];
    private server: net.Server | null = null;
    private shuttingDown = false;
    private closed: Promise<void> | null = null;

    constructor(config: ServerConfigInput = {}, options: WebServerOptions = {}) {
        this.config = ServerConfigSchema.parse(config);
        this.logger = options.logger ?? createLogger(this.config.logLevel);
        this.files = options.files ?? fsFileProvider;
        this.serializer = options.serializer ?? jsonSerializer;
    }

    get activeCount(): number {
        return this.active.size;
    }

    get pendingCount(): number {
        return this.pending.length;
    }

    get listening(): boolean {
        return this.server?.listening ?? false;
    }

    address(): net.AddressInfo | null {
        const addr = this.server?.address();
        return addr && typeof addr === 'object' ? addr : null;
    }

    route(pattern: string, handler: Handler, options: RouteOptionsInput = {}): Route {
        return this.routes.add(pattern, handler, options);
    }

    // Methods follow the resource's capabilities; access control defaults to '*'.
    addResource(pattern: string, resource: Resource, options: ResourceOptions = {}): Route {
        const methods = resourceMethods(resource);
        if (methods.length === 0) {
            throw new Error(`Resource for ${pattern} implements no methods`);
        }
        const handler = resourceHandler(resource, {
            serializer: this.serializer,
            debug: this.config.debug,
            onError: (err) => this.logger.error('resource serialization failed', { pattern, ...describeError(err) }),
        });
        return this.routes.add(pattern, handler, { accessControl: {}, ...options, methods });
    }

    catchAll(handler: Handler, options: ResourceOptions = {}): Route {
        return this.routes.setCatchAll(handler, options);
    }

    private get context(): ServerContext {
        return {
            routes: this.routes,
            requestTimeoutMs: this.config.requestTimeoutMs,
            debug: this.config.debug,
            logger: this.logger,
            files: this.files,
        };
    }

    start(): Promise<net.AddressInfo> {
        if (this.server) {
            return Promise.reject(new Error('Server already started'));
        }
        this.routes.seal();
        const server = net.createServer({ pauseOnConnect: true }, (socket) => this.onConnection(socket));
        this.server = server;
        const { host, port, backlog } = this.config;
        return new Promise((resolve, reject) => {
            server.once('error', reject);
            server.listen({ host, port, backlog }, () => {
                server.removeListener('error', reject);
                server.on('error', (err) => this.logger.error('listener error', describeError(err)));
                const addr = this.address();
                if (!addr) {
                    reject(new Error('Server has no address'));
                    return;
                }
                this.logger.info('server listening', { host: addr.address, port: addr.port });
                resolve(addr);
            });
        });
    }

    private onConnection(socket: net.Socket): void {
        if (this.shuttingDown) {
            socket.destroy();
            return;
        }
        if (this.active.size < this.config.maxConcurrency) {
            this.admit(socket);
            return;
        }
        if (this.pending.length >= this.config.backlog) {
            this.logger.debug('connection rejected, backlog full', { remote: socket.remoteAddress });
            socket.destroy();
            return;
        }
        this.pending.push(socket);
        socket.once('close', () => {
            const idx = this.pending.indexOf(socket);
            if (idx >= 0) this.pending.splice(idx, 1);
        });
        // Errors on a queued socket only end in 'close'.
        socket.on('error', (err) => this.logger.debug('queued socket error', describeError(err)));
        this.logger.debug('connection queued', { pending: this.pending.length });
    }

    private admit(socket: net.Socket): void {
        const controller = new AbortController();
        const task: Task = { controller, done: Promise.resolve() };
        this.active.add(task);
        task.done = handleConnection(socket, this.context, controller)
            .catch((err: unknown) => this.logger.error('connection task failed', describeError(err)))
            .finally(() => {
                this.active.delete(task);
                this.admitNext();
            });
    }

    private admitNext(): void {
        while (!this.shuttingDown && this.active.size < this.config.maxConcurrency && this.pending.length > 0) {
            const socket = this.pending.shift();
            if (socket && !socket.destroyed) {
                this.admit(socket);
            }
        }
    }

    // Stops accepting, cancels every active connection and waits for them.
    shutdown(): Promise<void> {
        if (this.closed) return this.closed;
        this.shuttingDown = true;
        this.closed = this.doShutdown();
        return this.closed;
    }

    private async doShutdown(): Promise<void> {
        const server = this.server;
        const listenerClosed = new Promise<void>((resolve) => {
            if (!server || !server.listening) return resolve();
            server.close(() => resolve());
        });
        for (const socket of this.pending.splice(0)) {
            socket.destroy();
        }
        const tasks = [...this.active];
        for (const task of tasks) {
            task.controller.abort(new CancelledError('Server shutting down'));
        }
        await Promise.all(tasks.map((t) => t.done));
        await listenerClosed;
        this.logger.info('server stopped');
    }
}
