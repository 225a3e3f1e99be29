import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { EventStateStore, isValidEventId } from '../../src/state/EventStateStore';
import { StateWriteError } from '../../src/errors/ProvisioningError';

describe('EventStateStore', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'event-state-'));
    filePath = path.join(tmpDir, 'nested', 'event-id');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns undefined when nothing was persisted', async () => {
    await expect(new EventStateStore(filePath).read()).resolves.toBeUndefined();
  });

  it('writes and reads back the event ID', async () => {
    const store = new EventStateStore(filePath);
    await store.write('evt-42');

    await expect(fs.readFile(filePath, 'utf8')).resolves.toBe('evt-42\n');
    await expect(store.read()).resolves.toBe('evt-42');
    await expect(fs.readdir(path.dirname(filePath))).resolves.toEqual([ 'event-id' ]);
  });

  it('overwrites a previous value', async () => {
    const store = new EventStateStore(filePath);
    await store.write('evt-1');
    await store.write('evt-2');

    await expect(store.read()).resolves.toBe('evt-2');
  });

  it('treats an empty file as not configured', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '  \n');

    await expect(new EventStateStore(filePath).read()).resolves.toBeUndefined();
  });

  it('treats a file with control characters as not configured', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, 'evt\u0000broken');

    await expect(new EventStateStore(filePath).read()).resolves.toBeUndefined();
  });

  it('treats an unreadable path as not configured', async () => {
    await fs.mkdir(filePath, { recursive: true });

    await expect(new EventStateStore(filePath).read()).resolves.toBeUndefined();
  });

  it('refuses to persist an invalid ID', async () => {
    await expect(new EventStateStore(filePath).write('')).rejects.toBeInstanceOf(StateWriteError);
  });

  it('reports a write failure as StateWriteError and leaves no temp file', async () => {
    // 目标路径是目录，rename 会失败
    await fs.mkdir(filePath, { recursive: true });
    const store = new EventStateStore(filePath);

    await expect(store.write('evt-1')).rejects.toMatchObject({ name: 'StateWriteError', exitCode: 41 });
    await expect(fs.readdir(path.dirname(filePath))).resolves.toEqual([ 'event-id' ]);
  });

  it('keeps the original cause when the temp file cannot be removed either', async () => {
    await fs.mkdir(filePath, { recursive: true });
    const rm = vi.spyOn(fs, 'rm').mockRejectedValueOnce(new Error('read-only file system'));
    const store = new EventStateStore(filePath);

    try {
      const error = await store.write('evt-1').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StateWriteError);
      expect(error instanceof StateWriteError && error.cause).toMatchObject({ code: 'EISDIR' });
      expect(rm).toHaveBeenCalledTimes(1);
    } finally {
      rm.mockRestore();
    }
  });

  it('clears the persisted ID', async () => {
    const store = new EventStateStore(filePath);
    await store.write('evt-1');

    await expect(store.clear()).resolves.toBe(true);
    await expect(store.clear()).resolves.toBe(false);
    await expect(store.read()).resolves.toBeUndefined();
  });
});

describe('isValidEventId', () => {
  it('accepts ordinary identifiers', () => {
    expect(isValidEventId('2024-05-01T10:00:00Z')).toBe(true);
  });

  it('rejects empty strings and control characters', () => {
    expect(isValidEventId('')).toBe(false);
    expect(isValidEventId('a\nb')).toBe(false);
  });
});
