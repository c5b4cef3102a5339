import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { fsFileProvider, getMimeType } from './static';

describe('getMimeType', () => {
    it('maps known extensions', () => {
        expect(getMimeType('static/index.html')).toBe('text/html');
        expect(getMimeType('a/b/PHOTO.JPG')).toBe('image/jpeg');
        expect(getMimeType('bootstrap.min.css')).toBe('text/css');
    });

    it('falls back to text/plain', () => {
        for (const name of ['', '.', 'bbb', 'bbb.bbbb', '/', ' ']) {
            expect(getMimeType(name)).toBe('text/plain');
        }
    });
});

describe('fsFileProvider', () => {
    let dir = '';

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tinyweb-'));
        await fs.writeFile(path.join(dir, 'hello.txt'), 'hello file');
    });

    afterAll(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('stats files and directories', async () => {
        expect(await fsFileProvider.stat(path.join(dir, 'hello.txt'))).toEqual({ size: 10, isFile: true });
        expect(await fsFileProvider.stat(dir)).toMatchObject({ isFile: false });
        expect(await fsFileProvider.stat(path.join(dir, 'missing.txt'))).toBeNull();
        expect(await fsFileProvider.stat(path.join(dir, 'hello.txt', 'below'))).toBeNull();
    });

    it('reads a file in chunks', async () => {
        const file = await fsFileProvider.open(path.join(dir, 'hello.txt'));
        const buf = Buffer.alloc(6);
        try {
            expect(await file.read(buf)).toBe(6);
            expect(buf.toString()).toBe('hello ');
            expect(await file.read(buf)).toBe(4);
            expect(buf.subarray(0, 4).toString()).toBe('file');
            expect(await file.read(buf)).toBe(0);
        } finally {
            await file.close();
        }
    });
});
