// src/stateStore.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageUnavailable } from './errors';
import { StateStore } from './stateStore';

describe('StateStore', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'state-store-test-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('returns the payload that was put', () => {
        const store = StateStore.open(path.join(dir, 'data', 'state.db'));
        store.put('user:1', 'count=1');

        const record = store.get('user:1');
        expect(record?.key).toBe('user:1');
        expect(record?.payload).toBe('count=1');
        expect(typeof record?.updatedAt).toBe('number');
        store.close();
    });

    it('returns undefined for a key that was never written', () => {
        const store = StateStore.open(path.join(dir, 'state.db'));
        expect(store.get('user:404')).toBeUndefined();
        store.close();
    });

    it('keeps a single record per key, last write wins', () => {
        const store = StateStore.open(path.join(dir, 'state.db'));
        store.put('user:1', 'count=1');
        store.put('user:1', 'count=2');

        expect(store.size()).toBe(1);
        expect(store.get('user:1')?.payload).toBe('count=2');
        store.close();
    });

    it('keeps records across close and reopen', () => {
        const dbPath = path.join(dir, 'data', 'state.db');
        const first = StateStore.open(dbPath);
        first.put('user:1', 'count=1');
        first.put('user:2', 'count=5');
        first.close();

        const second = StateStore.open(dbPath);
        expect(second.get('user:1')?.payload).toBe('count=1');
        expect(second.get('user:2')?.payload).toBe('count=5');
        expect(second.size()).toBe(2);
        second.close();
    });

    it('creates missing parent directories', () => {
        const dbPath = path.join(dir, 'nested', 'deeper', 'state.db');
        const store = StateStore.open(dbPath);

        expect(fs.existsSync(dbPath)).toBe(true);
        store.close();
    });

    it('throws StorageUnavailable when the directory cannot be created', () => {
        const blocker = path.join(dir, 'blocker');
        fs.writeFileSync(blocker, 'not a directory');

        expect(() => StateStore.open(path.join(blocker, 'state.db'))).toThrow(StorageUnavailable);
    });

    it('can be closed more than once and refuses use afterwards', () => {
        const store = StateStore.open(path.join(dir, 'state.db'));
        store.close();
        store.close();

        expect(store.isOpen).toBe(false);
        expect(() => store.get('user:1')).toThrow(StorageUnavailable);
        expect(() => store.put('user:1', 'x')).toThrow(StorageUnavailable);
    });

    it('rolls back every write of a failed transaction', () => {
        const store = StateStore.open(path.join(dir, 'state.db'));
        store.put('user:1', 'before');

        expect(() =>
            store.transaction(() => {
                store.put('user:1', 'after');
                store.put('user:2', 'new');
                throw new Error('boom');
            }),
        ).toThrow('boom');

        expect(store.get('user:1')?.payload).toBe('before');
        expect(store.get('user:2')).toBeUndefined();
        store.close();
    });

    it('returns the transaction result', () => {
        const store = StateStore.open(':memory:');
        const result = store.transaction(() => store.put('k', 'v').payload);
        expect(result).toBe('v');
        store.close();
    });
});
