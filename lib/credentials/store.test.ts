import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileCredentialStore, mergeCredentials, isEmptyPatch } from './store';

const ADDRESS = '0x52908400098527886E0F7030069857D2E4169EE7';

let dir: string;
let filePath: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'ethq-store-'));
  filePath = join(dir, 'nested', 'credentials.json');
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe('mergeCredentials', () => {
  it('sets provided fields and keeps the rest', () => {
    expect(mergeCredentials({ address: ADDRESS }, { nodeKey: 'node-test-key' })).toEqual({
      address: ADDRESS,
      nodeKey: 'node-test-key',
    });
  });

  it('removes fields patched with null', () => {
    expect(mergeCredentials({ address: ADDRESS, scanKey: 'scan-test-key' }, { scanKey: null })).toEqual({
      address: ADDRESS,
    });
  });

  it('does not mutate its inputs', () => {
    const current = { address: ADDRESS };
    mergeCredentials(current, { address: null });
    expect(current).toEqual({ address: ADDRESS });
  });
});

describe('isEmptyPatch', () => {
  it('treats a patch with only undefined fields as empty', () => {
    expect(isEmptyPatch({})).toBe(true);
    expect(isEmptyPatch({ address: undefined })).toBe(true);
    expect(isEmptyPatch({ address: null })).toBe(false);
  });
});

describe('FileCredentialStore', () => {
  it('returns empty credentials before anything was stored', async () => {
    const store = new FileCredentialStore(filePath);
    expect(await store.get()).toEqual({});
  });

  it('persists across store instances', async () => {
    await new FileCredentialStore(filePath).set({ address: ADDRESS, scanKey: 'scan-test-key' });
    expect(await new FileCredentialStore(filePath).get()).toEqual({
      address: ADDRESS,
      scanKey: 'scan-test-key',
    });
  });

  it('setting only nodeKey leaves a stored address untouched', async () => {
    const store = new FileCredentialStore(filePath);
    await store.set({ address: ADDRESS });

    const returned = await store.set({ nodeKey: 'node-test-key' });

    expect(returned).toEqual({ address: ADDRESS, nodeKey: 'node-test-key' });
    expect(await store.get()).toEqual({ address: ADDRESS, nodeKey: 'node-test-key' });
  });

  it('unsets a single field', async () => {
    const store = new FileCredentialStore(filePath);
    await store.set({ address: ADDRESS, nodeKey: 'node-test-key' });
    await store.set({ nodeKey: null });
    expect(await store.get()).toEqual({ address: ADDRESS });
  });

  it('does not write anything for an empty patch', async () => {
    const store = new FileCredentialStore(filePath);
    expect(await store.set({})).toEqual({});
    await expect(readFile(filePath, 'utf8')).rejects.toThrow();
  });

  it('leaves no temp files behind after a write', async () => {
    const store = new FileCredentialStore(filePath);
    await store.set({ address: ADDRESS });
    expect(await readdir(join(dir, 'nested'))).toEqual(['credentials.json']);
  });

  it('keeps the previous file when a write fails', async () => {
    const store = new FileCredentialStore(filePath);
    await store.set({ address: ADDRESS });

    // A directory squatting on the temp path makes writeFile fail
    await mkdir(`${filePath}.${process.pid}.tmp`);
    await expect(store.set({ nodeKey: 'node-test-key' })).rejects.toThrow();

    expect(await store.get()).toEqual({ address: ADDRESS });
  });

  it('reads a malformed file as empty and warns', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await mkdir(join(dir, 'nested'), { recursive: true });
    await writeFile(filePath, '{ not json');

    expect(await new FileCredentialStore(filePath).get()).toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('drops only the invalid field when a stored key is blank', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = new FileCredentialStore(filePath);
    await store.set({ address: ADDRESS, scanKey: 'scan-test-key' });
    await store.set({ nodeKey: '' });

    expect(await store.get()).toEqual({ address: ADDRESS, scanKey: 'scan-test-key' });
    expect(warn).toHaveBeenCalledWith(`Ignoring invalid nodeKey in credentials file ${filePath}`);
  });

  it('keeps the other fields when the next key is stored after a bad one', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await mkdir(join(dir, 'nested'), { recursive: true });
    await writeFile(filePath, JSON.stringify({ address: ADDRESS, nodeKey: 42, scanKey: 'scan-test-key' }));

    const store = new FileCredentialStore(filePath);
    await store.set({ nodeKey: 'node-test-key' });

    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({
      address: ADDRESS,
      scanKey: 'scan-test-key',
      nodeKey: 'node-test-key',
    });
  });

  it('reads a file that is not a JSON object as empty', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await mkdir(join(dir, 'nested'), { recursive: true });
    await writeFile(filePath, JSON.stringify([ADDRESS]));

    expect(await new FileCredentialStore(filePath).get()).toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('drops unknown keys from the stored file', async () => {
    await mkdir(join(dir, 'nested'), { recursive: true });
    await writeFile(filePath, JSON.stringify({ address: ADDRESS, legacy: true }));
    expect(await new FileCredentialStore(filePath).get()).toEqual({ address: ADDRESS });
  });
});
