// src/static.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import { FileProvider, FileStat, OpenFile } from './types';

const mimeTypes: { [key: string]: string } = {
    '.html': 'text/html',
    '.css': 'text/css',
    '.js': 'application/javascript',
    '.json': 'application/json',
    '.txt': 'text/plain',
    '.svg': 'image/svg+xml',
    '.ico': 'image/x-icon',
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.gif': 'image/gif',
};

export function getMimeType(filePath: string): string {
    const ext = path.extname(filePath).toLowerCase();
    return mimeTypes[ext] || 'text/plain';
}

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

// Local filesystem, resolved against the process working directory.
export const fsFileProvider: FileProvider = {
    async stat(filePath: string): Promise<FileStat | null> {
        try {
            const stats = await fs.stat(filePath);
            return { size: stats.size, isFile: stats.isFile() };
        } catch (e) {
            if (isMissing(e)) return null;
            throw e;
        }
    },

    async open(filePath: string): Promise<OpenFile> {
        const handle = await fs.open(filePath, 'r');
        return {
            read: async (buffer: Buffer) => (await handle.read(buffer, 0, buffer.length, null)).bytesRead,
            close: () => handle.close(),
        };
    },
};
