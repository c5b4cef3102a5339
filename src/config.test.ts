import { describe, expect, it } from 'vitest';
import { loadConfig, ServerConfigSchema } from './config';

describe('server config', () => {
    it('fills in defaults', () => {
        expect(ServerConfigSchema.parse({})).toEqual({
            host: '127.0.0.1',
            port: 8081,
            requestTimeoutMs: 3000,
            maxConcurrency: 10,
            constrained: false,
            backlog: 16,
            debug: false,
            logLevel: 'info',
        });
    });

    it('lowers the concurrency default on constrained hosts', () => {
        expect(ServerConfigSchema.parse({ constrained: true }).maxConcurrency).toBe(3);
        expect(ServerConfigSchema.parse({ constrained: true, maxConcurrency: 5 }).maxConcurrency).toBe(5);
    });

    it('rejects unknown keys and bad values', () => {
        expect(() => ServerConfigSchema.parse({ maxConcurrency: 0 })).toThrow();
        expect(() => ServerConfigSchema.parse({ port: 70000 })).toThrow();
        expect(() => ServerConfigSchema.parse({ timeout: 3 })).toThrow();
    });
});

describe('loadConfig', () => {
    it('reads TINYWEB_* variables', () => {
        const config = loadConfig({
            TINYWEB_HOST: '0.0.0.0',
            TINYWEB_PORT: '9000',
            TINYWEB_REQUEST_TIMEOUT_MS: '500',
            TINYWEB_MAX_CONCURRENCY: '2',
            TINYWEB_BACKLOG: '4',
            TINYWEB_DEBUG: 'yes',
            TINYWEB_LOG_LEVEL: 'warn',
        });
        expect(config).toEqual({
            host: '0.0.0.0',
            port: 9000,
            requestTimeoutMs: 500,
            maxConcurrency: 2,
            constrained: false,
            backlog: 4,
            debug: true,
            logLevel: 'warn',
        });
    });

    it('ignores blank variables', () => {
        expect(loadConfig({ TINYWEB_PORT: '  ', TINYWEB_CONSTRAINED: 'true' })).toMatchObject({
            port: 8081,
            maxConcurrency: 3,
        });
    });

    it('fails on values that do not parse', () => {
        expect(() => loadConfig({ TINYWEB_PORT: 'eighty' })).toThrow();
        expect(() => loadConfig({ TINYWEB_DEBUG: 'maybe' })).toThrow();
        expect(() => loadConfig({ TINYWEB_LOG_LEVEL: 'loud' })).toThrow();
    });
});
