import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import dotenv from 'dotenv';
import { createLogger, rootLoggerOptions } from '../Logger.ts';

let envDir: string;

beforeEach(async () => {
    envDir = await mkdtemp(join(tmpdir(), 'logger-test-'));
});

afterEach(async () => {
    await rm(envDir, { recursive: true, force: true });
});

describe('rootLoggerOptions', () => {
    test('level and pretty output come from a .env file', async () => {
        const envFile = join(envDir, '.env');
        await writeFile(envFile, 'LOG_LEVEL=debug\nNODE_ENV=development\n', 'utf-8');
        const env: Record<string, string> = {};

        dotenv.config({ path: envFile, processEnv: env });
        const options = rootLoggerOptions(env);

        expect(options.level).toBe('debug');
        expect(options.transport).toMatchObject({ target: 'pino-pretty' });
    });

    test('defaults: info level, plain JSON output', () => {
        const options = rootLoggerOptions({});

        expect(options.level).toBe('info');
        expect(options.transport).toBeUndefined();
    });
});

describe('createLogger', () => {
    test('child loggers use the root level', () => {
        expect(createLogger('Pipeline').level).toBe('silent');
    });
});
