// src/config.ts

import { z } from 'zod';
import { HTTP_METHODS } from './types';

const LogLevelSchema = z.union([
    z.literal('debug'),
    z.literal('info'),
    z.literal('warn'),
    z.literal('error'),
    z.literal('silent'),
]);

export const ServerConfigSchema = z
    .object({
        host: z.string().min(1).default('127.0.0.1'),
        port: z.number().int().min(0).max(65535).default(8081),
        requestTimeoutMs: z.number().int().positive().default(3000),
        // Left out: 10, or 3 on constrained hosts.
        maxConcurrency: z.number().int().positive().optional(),
        constrained: z.boolean().default(false),
        backlog: z.number().int().positive().default(16),
        debug: z.boolean().default(false),
        logLevel: LogLevelSchema.default('info'),
    })
    .strict()
    .transform(({ maxConcurrency, constrained, ...rest }) => ({
        ...rest,
        constrained,
        maxConcurrency: maxConcurrency ?? (constrained ? 3 : 10),
    }));

export type ServerConfigInput = z.input<typeof ServerConfigSchema>;
export type ServerConfig = z.output<typeof ServerConfigSchema>;

export const AccessControlSchema = z
    .object({
        origins: z.string().default('*'),
        headers: z.string().default('*'),
    })
    .strict();

export const RouteOptionsSchema = z
    .object({
        methods: z.array(z.enum(HTTP_METHODS)).min(1).default(['GET']),
        saveHeaders: z.array(z.string().min(1)).default([]),
        parseHeaders: z.boolean().default(false),
        maxBodySize: z.number().int().nonnegative().default(1024),
        accessControl: AccessControlSchema.optional(),
    })
    .strict();

export type RouteOptionsInput = z.input<typeof RouteOptionsSchema>;
export type RouteOptions = z.output<typeof RouteOptionsSchema>;

const ENV_PREFIX = 'TINYWEB_';

const intFromEnv = z.coerce.number().int();
const boolFromEnv = z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no']))
    .transform((v) => v === '1' || v === 'true' || v === 'yes');

// Builds the server config from TINYWEB_* environment variables.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const get = (name: string): string | undefined => {
        const value = env[ENV_PREFIX + name];
        return value === undefined || value.trim() === '' ? undefined : value;
    };
    const input: ServerConfigInput = {};
    const host = get('HOST');
    if (host !== undefined) input.host = host;
    const port = get('PORT');
    if (port !== undefined) input.port = intFromEnv.parse(port);
    const timeout = get('REQUEST_TIMEOUT_MS');
    if (timeout !== undefined) input.requestTimeoutMs = intFromEnv.parse(timeout);
    const maxConcurrency = get('MAX_CONCURRENCY');
    if (maxConcurrency !== undefined) input.maxConcurrency = intFromEnv.parse(maxConcurrency);
    const backlog = get('BACKLOG');
    if (backlog !== undefined) input.backlog = intFromEnv.parse(backlog);
    const debug = get('DEBUG');
    if (debug !== undefined) input.debug = boolFromEnv.parse(debug);
    const constrained = get('CONSTRAINED');
    if (constrained !== undefined) input.constrained = boolFromEnv.parse(constrained);
    const logLevel = get('LOG_LEVEL');
    if (logLevel !== undefined) input.logLevel = LogLevelSchema.parse(logLevel);
    return ServerConfigSchema.parse(input);
}
