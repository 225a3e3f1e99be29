import { afterEach, describe, it, expect, vi } from 'vitest';
import { EndpointResolver } from '../../src/endpoint/EndpointResolver';
import { ResolutionError } from '../../src/errors/ProvisioningError';
import { RetryPolicy } from '../../src/util/RetryPolicy';

type FetchInput = string | URL | Request;

const auth = { username: 'device-user', password: 'test-secret' };
const expectedAuthorization = `Basic ${Buffer.from('device-user:test-secret').toString('base64')}`;

function redirect(location: string, status = 302): Response {
  return new Response(null, { status, headers: { location }});
}

function createResolver(overrides: { redirectUrl?: string; redirectUrlIsCluster?: boolean; attempts?: number } = {}) {
  const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);
  const resolver = new EndpointResolver({
    redirectUrl: overrides.redirectUrl ?? 'https://redirect.example/device',
    redirectUrlIsCluster: overrides.redirectUrlIsCluster ?? false,
    auth,
    retryPolicy: new RetryPolicy({ attempts: overrides.attempts ?? 3, delayMs: 10_000, sleep }),
  });
  return { resolver, sleep };
}

function stubFetch(handler: (url: string) => Response) {
  const fetchMock = vi.fn(async (input: FetchInput, _init?: RequestInit): Promise<Response> => handler(String(input)));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function authorizationOf(init: RequestInit | undefined): string | null {
  return new Headers(init?.headers).get('authorization');
}

describe('EndpointResolver', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('follows a redirect to the cluster and trims the trailing slash', async () => {
    const fetchMock = stubFetch((url) => url === 'https://redirect.example/device' ?
      redirect('https://cluster-a.example/') :
      new Response('ok'));
    const { resolver } = createResolver();

    await expect(resolver.resolve()).resolves.toBe('https://cluster-a.example');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][1]?.redirect).toBe('manual');
  });

  it('re-sends basic auth on every hop, including cross-host and relative redirects', async () => {
    const fetchMock = stubFetch((url) => {
      switch (url) {
        case 'https://redirect.example/device':
          return redirect('https://gateway.example/hop');
        case 'https://gateway.example/hop':
          return redirect('/cluster-b', 307);
        default:
          return new Response('ok');
      }
    });
    const { resolver } = createResolver();

    await expect(resolver.resolve()).resolves.toBe('https://gateway.example/cluster-b');
    expect(fetchMock.mock.calls.map(([ input ]) => String(input))).toEqual([
      'https://redirect.example/device',
      'https://gateway.example/hop',
      'https://gateway.example/cluster-b',
    ]);
    for (const [ , init ] of fetchMock.mock.calls) {
      expect(authorizationOf(init)).toBe(expectedAuthorization);
    }
  });

  it('discards the body of every response it follows', async () => {
    let cancelled = 0;
    const trackedBody = () => new ReadableStream({
      cancel: () => {
        cancelled += 1;
      },
    });
    stubFetch((url) => url === 'https://redirect.example/device' ?
      new Response(trackedBody(), { status: 302, headers: { location: 'https://cluster-a.example' }}) :
      new Response(trackedBody()));
    const { resolver } = createResolver();

    await expect(resolver.resolve()).resolves.toBe('https://cluster-a.example');
    expect(cancelled).toBe(2);
  });

  it('returns the pointer verbatim when it is the cluster itself', async () => {
    const fetchMock = stubFetch(() => new Response('ok'));
    const { resolver } = createResolver({ redirectUrl: 'https://cluster-c.example/', redirectUrlIsCluster: true });

    await expect(resolver.resolve()).resolves.toBe('https://cluster-c.example/');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('gives up after the configured attempts when the pointer keeps failing', async () => {
    const fetchMock = stubFetch(() => new Response('unavailable', { status: 503 }));
    const { resolver, sleep } = createResolver({ attempts: 3 });

    const error = await resolver.resolve().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({ reason: 'exhausted', exitCode: 30 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10_000);
  });

  it('retries network errors', async () => {
    let calls = 0;
    vi.stubGlobal('fetch', vi.fn(async (_input: FetchInput, _init?: RequestInit): Promise<Response> => {
      calls += 1;
      if (calls === 1) {
        throw new TypeError('fetch failed');
      }
      return new Response('ok');
    }));
    const { resolver } = createResolver();

    await expect(resolver.resolve()).resolves.toBe('https://redirect.example/device');
    expect(calls).toBe(2);
  });

  it('does not retry when authentication is rejected', async () => {
    const fetchMock = stubFetch(() => new Response('denied', { status: 401 }));
    const { resolver } = createResolver();

    await expect(resolver.resolve()).rejects.toMatchObject({ reason: 'auth-rejected' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('detects redirect loops', async () => {
    stubFetch((url) => url === 'https://redirect.example/device' ?
      redirect('https://redirect.example/other') :
      redirect('https://redirect.example/device'));
    const { resolver } = createResolver();

    await expect(resolver.resolve()).rejects.toMatchObject({ reason: 'redirect-loop' });
  });

  it('stops after too many redirects', async () => {
    let hop = 0;
    stubFetch(() => {
      hop += 1;
      return redirect(`https://redirect.example/hop-${hop}`);
    });
    const { resolver } = createResolver();

    await expect(resolver.resolve()).rejects.toMatchObject({ reason: 'too-many-redirects' });
    expect(hop).toBe(10);
  });
});
