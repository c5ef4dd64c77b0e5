// src/app.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runMain } from './app';
import type { Logger } from './logger';

describe('runMain()', () => {
    let dir: string;
    let log: Logger;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bot-app-test-'));
        log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        process.exitCode = undefined;
    });

    afterEach(() => {
        process.exitCode = undefined;
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('exits non-zero when the database path cannot be written', async () => {
        const blocker = path.join(dir, 'blocker');
        fs.writeFileSync(blocker, 'not a directory');
        const sigintListeners = process.listenerCount('SIGINT');

        await runMain({
            env: { BOT_TOKEN: 'test-token', ALLOWED_USERS: '1', DATABASE_URL: path.join(blocker, 'state.db') },
            log,
        });

        expect(process.exitCode).toBe(1);
        expect(log.error).toHaveBeenCalledWith(expect.stringMatching(/^💥 Bot failed: Cannot open state store: /));
        expect(process.listenerCount('SIGINT')).toBe(sigintListeners);
    });

    it('exits non-zero on invalid configuration', async () => {
        await runMain({ env: { ALLOWED_USERS: '1' }, log });

        expect(process.exitCode).toBe(1);
        expect(log.error).toHaveBeenCalledWith(
            '💥 Bot failed: Invalid configuration: "BOT_TOKEN" env variable is required!',
        );
    });
});
