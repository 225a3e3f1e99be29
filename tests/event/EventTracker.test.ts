import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ClusterApiClient } from '../../src/cluster/ClusterApiClient';
import { RemoteQueryError } from '../../src/errors/ProvisioningError';
import { EventTracker, parseEventIdentifier } from '../../src/event/EventTracker';
import { EventStateStore } from '../../src/state/EventStateStore';

describe('parseEventIdentifier', () => {
  it('accepts plain text', () => {
    expect(parseEventIdentifier('  evt-7\n')).toBe('evt-7');
  });

  it('accepts JSON strings', () => {
    expect(parseEventIdentifier('"evt-8"')).toBe('evt-8');
  });

  it('keeps numeric-looking and literal bodies verbatim', () => {
    expect(parseEventIdentifier('1717')).toBe('1717');
    expect(parseEventIdentifier('12345678901234567890')).toBe('12345678901234567890');
    expect(parseEventIdentifier('1e3')).toBe('1e3');
    expect(parseEventIdentifier(' 42.0\n')).toBe('42.0');
    expect(parseEventIdentifier('true')).toBe('true');
  });

  it('accepts objects with event_id or eventId', () => {
    expect(parseEventIdentifier('{"event_id":"evt-9"}')).toBe('evt-9');
    expect(parseEventIdentifier('{"eventId":12}')).toBe('12');
  });

  it('rejects empty bodies and JSON without an identifier', () => {
    expect(parseEventIdentifier('')).toBeUndefined();
    expect(parseEventIdentifier('null')).toBeUndefined();
    expect(parseEventIdentifier('{"status":"ok"}')).toBeUndefined();
    expect(parseEventIdentifier('[ "evt" ]')).toBeUndefined();
  });
});

describe('EventTracker', () => {
  let tmpDir: string;
  let tracker: EventTracker;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'event-tracker-'));
    tracker = new EventTracker({
      client: new ClusterApiClient({ auth: { username: 'device-user', password: 'test-secret' }, deviceName: 'robot-1' }),
      store: new EventStateStore(path.join(tmpDir, 'event-id')),
    });
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('passes a large numeric event ID through unchanged', async () => {
    vi.stubGlobal('fetch', vi.fn(async (): Promise<Response> => new Response('12345678901234567890\n')));

    await expect(tracker.fetchRemoteEventId('https://cluster.example')).resolves.toBe('12345678901234567890');
  });

  it('fetches the remote event ID once', async () => {
    const fetchMock = vi.fn(async (): Promise<Response> => new Response('{"event_id":"evt-3"}'));
    vi.stubGlobal('fetch', fetchMock);

    await expect(tracker.fetchRemoteEventId('https://cluster.example')).resolves.toBe('evt-3');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fails without retrying when the cluster cannot be queried', async () => {
    const fetchMock = vi.fn(async (): Promise<Response> => new Response('down', { status: 500 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(tracker.fetchRemoteEventId('https://cluster.example')).rejects.toBeInstanceOf(RemoteQueryError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fails when the response holds no usable identifier', async () => {
    vi.stubGlobal('fetch', vi.fn(async (): Promise<Response> => new Response('   ')));

    await expect(tracker.fetchRemoteEventId('https://cluster.example'))
      .rejects.toThrow('Cluster https://cluster.example returned no usable event ID');
  });

  it('persists and reads back the local event ID', async () => {
    await expect(tracker.readPersistedEventId()).resolves.toBeUndefined();
    await tracker.persistEventId('evt-4');
    await expect(tracker.readPersistedEventId()).resolves.toBe('evt-4');
  });
});
