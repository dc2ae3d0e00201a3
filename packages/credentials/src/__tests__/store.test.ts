import {mkdtemp, readFile, rm, writeFile} from 'node:fs/promises';
import {tmpdir} from 'node:os';
import path from 'node:path';

import {afterEach, beforeEach, describe, expect, it} from 'vitest';

import {createFileCredentialStore, createInMemoryCredentialStore, type CredentialRecord} from '../index';

const first: CredentialRecord = {identity: 'svc@relaygate.test', token: 'token-1', refreshed_at: '2026-03-01T10:00:00.000Z'};
const second: CredentialRecord = {identity: 'ops@relaygate.test', token: 'token-2', refreshed_at: '2026-03-01T11:00:00.000Z'};

describe('createInMemoryCredentialStore', () => {
  it('saves, loads and removes records by identity', async () => {
    const store = createInMemoryCredentialStore([first]);

    expect(await store.load('svc@relaygate.test')).toEqual(first);
    await store.save({...first, token: 'token-3'});
    expect((await store.load('svc@relaygate.test'))?.token).toBe('token-3');
    await store.remove('svc@relaygate.test');
    expect(await store.load('svc@relaygate.test')).toBeNull();
  });
});

describe('createFileCredentialStore', () => {
  let directory = '';

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'relaygate-credentials-'));
  });

  afterEach(async () => {
    await rm(directory, {recursive: true, force: true});
  });

  it('returns null before anything was written', async () => {
    const store = createFileCredentialStore({filePath: path.join(directory, 'tokens.json')});

    expect(await store.load('svc@relaygate.test')).toBeNull();
  });

  it('persists records across store instances', async () => {
    const filePath = path.join(directory, 'nested', 'tokens.json');
    const writer = createFileCredentialStore({filePath});
    await Promise.all([writer.save(first), writer.save(second)]);

    const reader = createFileCredentialStore({filePath});
    expect(await reader.load('svc@relaygate.test')).toEqual(first);
    expect(await reader.load('ops@relaygate.test')).toEqual(second);

    const onDisk: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    expect(onDisk).toEqual({
      version: 1,
      records: {'svc@relaygate.test': first, 'ops@relaygate.test': second}
    });
  });

  it('removes a single identity', async () => {
    const filePath = path.join(directory, 'tokens.json');
    const store = createFileCredentialStore({filePath});
    await store.save(first);
    await store.save(second);

    await store.remove('svc@relaygate.test');
    await store.remove('unknown@relaygate.test');

    expect(await store.load('svc@relaygate.test')).toBeNull();
    expect(await store.load('ops@relaygate.test')).toEqual(second);
  });

  it('refuses a malformed file', async () => {
    const filePath = path.join(directory, 'tokens.json');
    await writeFile(filePath, '{"version":2,"records":{}}', 'utf8');
    const store = createFileCredentialStore({filePath});

    await expect(store.load('svc@relaygate.test')).rejects.toThrow('is malformed');
  });
});
