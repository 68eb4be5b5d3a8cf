import { afterEach, describe, expect, it, vi } from 'vitest';
import { Effect } from 'effect';
import { makeHttpClient } from '../../../lib/HttpClient/HttpClient.service.js';
import { USER_AGENT } from '../../infrastructure/EffectTestUtils.js';

const URL_A = 'https://waters.test/rivers/alder.html';

describe('HttpClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('identifies itself with the configured User-Agent', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('<p>Alder</p>', { status: 200 }));
    const client = makeHttpClient({ userAgent: USER_AGENT, timeoutMs: 1000 });

    const response = await Effect.runPromise(client.get(URL_A));

    expect(response).toEqual({ url: URL_A, status: 200, body: '<p>Alder</p>' });
    expect(fetchSpy).toHaveBeenCalledWith(
      URL_A,
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': USER_AGENT }),
      })
    );
  });

  it('returns error statuses as responses', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('Service Unavailable', { status: 503 })
    );
    const client = makeHttpClient({ userAgent: USER_AGENT, timeoutMs: 1000 });

    const response = await Effect.runPromise(client.get(URL_A));

    expect(response.status).toBe(503);
    expect(response.body).toBe('Service Unavailable');
  });

  it('fails with a connection NetworkError when fetch rejects', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const client = makeHttpClient({ userAgent: USER_AGENT, timeoutMs: 1000 });

    const error = await Effect.runPromise(Effect.flip(client.get(URL_A)));

    expect(error._tag).toBe('NetworkError');
    expect(error.reason).toBe('connection');
    expect(error.message).toBe(`Failed to fetch ${URL_A}: fetch failed`);
  });

  it('aborts and fails with a timeout NetworkError', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = makeHttpClient({ userAgent: USER_AGENT, timeoutMs: 20 });

    const error = await Effect.runPromise(Effect.flip(client.get(URL_A)));

    expect(error.reason).toBe('timeout');
    expect(error.message).toBe(`Request to ${URL_A} timed out after 20ms`);
  });
});
