import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StorageUnavailableError } from './errors.js';
import { KeyValueStore, assertJsonValue, openDatabase, openStore } from './store.js';

describe('KeyValueStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'gateway-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should persist values across reopen', () => {
    const file = path.join(dir, 'state.db');
    const first = openStore(file, 'node_id_mapping');
    first.set('305419896', '!1234abcd');
    first.set('meta', { count: 2, tags: ['a', 'b'], ok: true, none: null });
    first.close();

    const second = openStore(file, 'node_id_mapping');
    expect(second.get('305419896')).toBe('!1234abcd');
    expect(second.get('meta')).toEqual({ count: 2, tags: ['a', 'b'], ok: true, none: null });
    expect(second.size()).toBe(2);
    second.close();
  });

  it('should create missing parent directories', () => {
    const file = path.join(dir, 'nested', 'deeper', 'state.db');
    const store = openStore(file, 'callsign_mapping');
    store.set('!1234abcd', 'Base Camp');
    expect(store.get('!1234abcd')).toBe('Base Camp');
    store.close();
  });

  it('should return undefined for missing keys', () => {
    const store = openStore(':memory:', 'ns');
    expect(store.get('nope')).toBeUndefined();
    expect(store.has('nope')).toBe(false);
    store.close();
  });

  it('should overwrite, delete and list keys in order', () => {
    const store = openStore(':memory:', 'ns');
    store.set('b', 1);
    store.set('a', 2);
    store.set('b', 3);
    expect(store.keys()).toEqual(['a', 'b']);
    expect(store.entries()).toEqual([['a', 2], ['b', 3]]);
    expect(store.delete('a')).toBe(true);
    expect(store.delete('a')).toBe(false);
    expect(store.keys()).toEqual(['b']);
    store.close();
  });

  it('should keep namespaces in one database independent', () => {
    const db = openDatabase(':memory:');
    const ids = new KeyValueStore(db, 'node_id_mapping');
    const names = new KeyValueStore(db, 'callsign_mapping');
    ids.set('k', 'id');
    names.set('k', 'name');
    expect(ids.get('k')).toBe('id');
    expect(names.get('k')).toBe('name');
    ids.close();
    expect(db.open).toBe(true);
    db.close();
  });

  it('should reject values that are not JSON-serializable', () => {
    const store = openStore(':memory:', 'ns');
    expect(() => store.set('k', Number.NaN)).toThrow(TypeError);
    expect(() => store.set('k', { when: new Date(0) })).toThrow(TypeError);
    expect(() => store.set('k', undefined)).toThrow(TypeError);
    expect(store.has('k')).toBe(false);
    store.close();
  });

  it('should treat corrupt rows as absent', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const db = openDatabase(':memory:');
    const store = new KeyValueStore(db, 'ns');
    db.prepare('INSERT INTO ns (key, value) VALUES (?, ?)').run('bad', '{not json');
    store.set('good', 'yes');
    expect(store.get('bad')).toBeUndefined();
    expect(store.entries()).toEqual([['good', 'yes']]);
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
    db.close();
  });

  it('should commit a batch atomically and roll back on failure', () => {
    const store = openStore(':memory:', 'ns');
    store.batch(() => {
      store.set('a', 1);
      store.set('b', 2);
    });
    expect(store.size()).toBe(2);

    expect(() =>
      store.batch(() => {
        store.set('c', 3);
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(store.has('c')).toBe(false);
    store.close();
  });

  it('should fail with StorageUnavailableError after close', () => {
    const store = openStore(':memory:', 'ns');
    store.close();
    store.close();
    expect(() => store.get('k')).toThrow(StorageUnavailableError);
    expect(() => store.set('k', 1)).toThrow(StorageUnavailableError);
  });

  it('should reject namespaces that are not plain identifiers', () => {
    const db = openDatabase(':memory:');
    expect(() => new KeyValueStore(db, 'x; DROP TABLE y')).toThrow(TypeError);
    db.close();
  });

  it('should wrap open failures in StorageUnavailableError', () => {
    const blocker = path.join(dir, 'not-a-directory');
    writeFileSync(blocker, '');
    expect(() => openDatabase(path.join(blocker, 'state.db'))).toThrow(StorageUnavailableError);
  });
});

describe('assertJsonValue', () => {
  it('should accept nested plain data', () => {
    expect(() => assertJsonValue({ a: [1, 'two', false, null, { b: 0.5 }] })).not.toThrow();
  });

  it('should name the offending path', () => {
    expect(() => assertJsonValue({ a: [1, Infinity] })).toThrow('$.a[1]');
  });
});
