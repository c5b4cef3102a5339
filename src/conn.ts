// src/conn.ts

import * as net from 'net';
import { ByteReader, ByteSink, ConnectionError, HTTPError } from './types';

// Promise-based wrapper around a paused socket. The socket is only resumed
// while a read is outstanding, so at most one chunk is ever buffered.
export class TCPConn implements ByteReader, ByteSink {
    private pending: Buffer = Buffer.alloc(0);
    private ended = false;
    private err: Error | null = null;
    private reader: null | { resolve: (data: Buffer) => void; reject: (err: Error) => void } = null;

    constructor(readonly socket: net.Socket, private readonly signal: AbortSignal) {
        socket.pause();

        socket.on('data', (data: Buffer) => {
            socket.pause();
            if (!this.reader) {
                this.pending = Buffer.concat([this.pending, data]);
                return;
            }
            this.reader.resolve(data);
            this.reader = null;
        });

        socket.on('end', () => {
            this.ended = true;
            if (this.reader) {
                this.reader.resolve(Buffer.alloc(0));
                this.reader = null;
            }
        });

        socket.on('error', (err: Error) => {
            this.err = err;
            if (this.reader) {
                this.reader.reject(new ConnectionError(err.message, { cause: err }));
                this.reader = null;
            }
        });

        const onAbort = () => {
            if (this.reader) {
                this.reader.reject(this.abortReason());
                this.reader = null;
            }
            socket.destroy();
        };
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
            socket.once('close', () => signal.removeEventListener('abort', onAbort));
        }
    }

    // Resolves with the next chunk, or an empty buffer on EOF.
    private read(): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            if (this.signal.aborted) return reject(this.abortReason());
            if (this.err) return reject(new ConnectionError(this.err.message, { cause: this.err }));
            if (this.ended) return resolve(Buffer.alloc(0));
            this.reader = { resolve, reject };
            this.socket.resume();
        });
    }

    private abortReason(): Error {
        const reason: unknown = this.signal.reason;
        return reason instanceof Error ? reason : new ConnectionError('Connection aborted');
    }

    // Reads one line terminated by LF (CR before it is dropped).
    // Lines longer than maxLength fail without buffering the rest.
    async readLine(maxLength: number): Promise<string> {
        for (;;) {
            const idx = this.pending.indexOf(0x0a);
            if (idx >= 0) {
                if (idx > maxLength + 1) {
                    throw new HTTPError(431, 'Header line too long');
                }
                let line = this.pending.subarray(0, idx);
                this.pending = this.pending.subarray(idx + 1);
                if (line.length > 0 && line[line.length - 1] === 0x0d) {
                    line = line.subarray(0, line.length - 1);
                }
                return line.toString('latin1');
            }
            if (this.pending.length > maxLength + 1) {
                throw new HTTPError(431, 'Header line too long');
            }
            const chunk = await this.read();
            if (chunk.length === 0) {
                throw new ConnectionError('Connection closed mid-request');
            }
            this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
        }
    }

    async readExactly(length: number): Promise<Buffer> {
        const parts: Buffer[] = [];
        let remaining = length;
        while (remaining > 0) {
            if (this.pending.length === 0) {
                const chunk = await this.read();
                if (chunk.length === 0) {
                    throw new ConnectionError('Connection closed mid-body');
                }
                this.pending = chunk;
            }
            const part = this.pending.subarray(0, remaining);
            this.pending = this.pending.subarray(part.length);
            parts.push(part);
            remaining -= part.length;
        }
        return Buffer.concat(parts, length);
    }

    write(data: Buffer | string): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.signal.aborted) return reject(this.abortReason());
            if (this.socket.destroyed || !this.socket.writable) {
                return reject(new ConnectionError('Socket is not writable'));
            }
            this.socket.write(data, (err?: Error | null) =>
                err ? reject(new ConnectionError(err.message, { cause: err })) : resolve()
            );
        });
    }

    // Flushes what was written, then releases the socket.
    close(): Promise<void> {
        return new Promise((resolve) => {
            if (this.socket.destroyed) return resolve();
            this.socket.once('close', () => resolve());
            this.socket.end(() => this.socket.destroy());
        });
    }

    destroy(): void {
        this.socket.destroy();
    }

    // Ends with a TCP reset, so the peer sees the response as broken off.
    reset(): void {
        if (this.socket.destroyed) return;
        this.socket.resetAndDestroy();
    }
}
