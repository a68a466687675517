import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLocalFileStorage, type FileStorage } from './file-storage.js';

describe('createLocalFileStorage', () => {
  let root: string;
  let storage: FileStorage;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'storage-test-'));
    storage = createLocalFileStorage(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes and reads back under nested keys', async () => {
    await storage.write('tasks/a.json', '{"ok":true}');

    expect((await storage.read('tasks/a.json'))?.toString('utf8')).toBe('{"ok":true}');
    expect(await storage.stat('tasks/a.json')).toEqual({ sizeBytes: 11 });
  });

  it('replaces existing content without leaving temp files', async () => {
    await storage.write('outputs/r.xlsx', Buffer.from('first'));
    await storage.write('outputs/r.xlsx', Buffer.from('second!'));

    expect((await storage.read('outputs/r.xlsx'))?.toString('utf8')).toBe('second!');
    expect(await readdir(path.join(root, 'outputs'))).toEqual(['r.xlsx']);
  });

  it('returns null for missing keys and directories', async () => {
    await storage.write('outputs/r.xlsx', 'x');

    expect(await storage.read('outputs/missing.xlsx')).toBeNull();
    expect(await storage.stat('outputs/missing.xlsx')).toBeNull();
    expect(await storage.stat('outputs')).toBeNull();
  });

  it('streams stored bytes', async () => {
    await storage.write('outputs/r.xlsx', 'streamed');

    const chunks: Buffer[] = [];
    for await (const chunk of storage.createReadStream('outputs/r.xlsx')) {
      chunks.push(Buffer.from(chunk));
    }

    expect(Buffer.concat(chunks).toString('utf8')).toBe('streamed');
  });

  it('refuses keys outside the root', async () => {
    await expect(storage.write('../escape.txt', 'x')).rejects.toThrow(
      'Storage key escapes the storage root: ../escape.txt',
    );
    await expect(storage.read('/etc/hostname')).rejects.toThrow('escapes the storage root');
    expect(() => storage.createReadStream('../../x')).toThrow('escapes the storage root');
  });
});
