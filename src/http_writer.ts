// src/http_writer.ts

import { STATUS_CODES } from 'http';
import { fsFileProvider, getMimeType } from './static';
import { AccessControl, ByteSink, FileProvider, HTTPMethod, InvalidStateError } from './types';

export type ResponseState = 'not-started' | 'headers-sent' | 'body-streaming' | 'done';

export const FILE_CHUNK_SIZE = 512;
export const DEFAULT_MAX_AGE = 2592000; // 30 days

export interface ResponseOptions {
    // When set, start() emits the Access-Control-* headers.
    accessControl?: AccessControl;
    methods?: Iterable<HTTPMethod>;
    files?: FileProvider;
    // HEAD: status and headers go out, body writes are dropped.
    omitBody?: boolean;
}

export interface SendFileOptions {
    contentType?: string;
    contentEncoding?: string;
    maxAge?: number;
}

export function reasonPhrase(code: number): string {
    return STATUS_CODES[code] || 'Unknown Status';
}

// Writes an HTTP response to a connection. Status and headers are
// mutable until start(); the body follows them and nothing can be
// written once the exchange is done.
export class HTTPResponse {
    private _code = 200;
    private _version = '1.0';
    private _state: ResponseState = 'not-started';
    private readonly _headers = new Map<string, string>();
    private readonly files: FileProvider;

    constructor(private readonly sink: ByteSink, private readonly options: ResponseOptions = {}) {
        this.files = options.files ?? fsFileProvider;
    }

    get code(): number {
        return this._code;
    }

    get version(): string {
        return this._version;
    }

    get state(): ResponseState {
        return this._state;
    }

    get headers(): ReadonlyMap<string, string> {
        return this._headers;
    }

    get started(): boolean {
        return this._state !== 'not-started';
    }

    private assertNotStarted(op: string): void {
        if (this._state !== 'not-started') {
            throw new InvalidStateError(`Cannot ${op}: response is ${this._state}`);
        }
    }

    setStatus(code: number): void {
        this.assertNotStarted('set status');
        this._code = code;
    }

    setVersion(version: string): void {
        this.assertNotStarted('set version');
        this._version = version;
    }

    setHeader(name: string, value: string): void {
        this.assertNotStarted('set header');
        this._headers.set(name, value);
    }

    addAccessControlHeaders(accessControl: AccessControl = this.options.accessControl ?? { origins: '*', headers: '*' }): void {
        const methods = this.options.methods ? [...this.options.methods].join(', ') : '*';
        this.setHeader('Access-Control-Allow-Origin', accessControl.origins);
        this.setHeader('Access-Control-Allow-Methods', methods);
        this.setHeader('Access-Control-Allow-Headers', accessControl.headers);
    }

    // Status line and headers go out as a single write.
    async start(contentType?: string): Promise<void> {
        this.assertNotStarted('start');
        if (contentType !== undefined) {
            this._headers.set('Content-Type', contentType);
        }
        if (this.options.accessControl && !this._headers.has('Access-Control-Allow-Origin')) {
            this.addAccessControlHeaders();
        }
        const headerLines = [`HTTP/${this._version} ${this._code} ${reasonPhrase(this._code)}`];
        for (const [key, value] of this._headers) {
            headerLines.push(`${key}: ${value}`);
        }
        // The state moves first: a failed write must not let a body follow.
        this._state = 'headers-sent';
        await this.sink.write(headerLines.join('\r\n') + '\r\n\r\n');
    }

    startHtml(): Promise<void> {
        return this.start('text/html');
    }

    async send(data: Buffer | string): Promise<void> {
        if (this._state === 'done') {
            throw new InvalidStateError('Cannot send: response is done');
        }
        if (this._state === 'not-started') {
            await this.start(this._headers.has('Content-Type') ? undefined : 'text/plain');
        }
        this._state = 'body-streaming';
        if (data.length > 0 && !this.options.omitBody) {
            await this.sink.write(data);
        }
    }

    // Streams a file in fixed-size chunks; a missing file becomes a 404.
    async sendFile(filePath: string, opts: SendFileOptions = {}): Promise<void> {
        this.assertNotStarted('send file');
        const stat = await this.files.stat(filePath);
        if (!stat || !stat.isFile) {
            await this.error(404);
            return;
        }
        const file = await this.files.open(filePath);
        try {
            const maxAge = opts.maxAge ?? DEFAULT_MAX_AGE;
            this._headers.set('Content-Type', opts.contentType ?? getMimeType(filePath));
            if (opts.contentEncoding) {
                this._headers.set('Content-Encoding', opts.contentEncoding);
            }
            this._headers.set('Content-Length', String(stat.size));
            this._headers.set('Cache-Control', maxAge > 0 ? `max-age=${maxAge}` : 'no-cache');
            await this.start();
            if (this.options.omitBody) return;
            const buf = Buffer.alloc(FILE_CHUNK_SIZE);
            for (;;) {
                const n = await file.read(buf);
                if (n === 0) break;
                await this.send(buf.subarray(0, n));
            }
        } finally {
            await file.close();
        }
    }

    async redirect(location: string, message?: string): Promise<void> {
        this.assertNotStarted('redirect');
        this._code = 302;
        this._headers.set('Location', location);
        if (message) {
            await this.start('text/html');
            await this.send(message);
        } else {
            await this.start();
        }
    }

    // Error replies are always fixed-length and end the connection.
    async error(code: number, detail?: string): Promise<void> {
        this.assertNotStarted('send error');
        const body = Buffer.from(`HTTP ${code} ${reasonPhrase(code)}\r\n` + (detail ? `${detail}\r\n` : ''), 'utf8');
        this._code = code;
        this._headers.set('Content-Type', 'text/plain');
        this._headers.set('Content-Length', String(body.length));
        this._headers.set('Connection', 'close');
        await this.start();
        await this.send(body);
    }

    finish(): void {
        this._state = 'done';
    }
}
