import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { TokenExchangeClient, readAccessToken } from '../../../src/oauth/token-exchange.js';
import { TokenExchangeHttpError, TokenParseError } from '../../../src/shared/errors.js';
import { createTestLogger } from '../../fixtures/streams.js';
import {
  TEST_OAUTH_CONFIG,
  TOKEN_BODY_WITHOUT_ACCESS_TOKEN,
  VALID_TOKEN_BODY,
} from '../../fixtures/oauth.js';

function makeClient(opts?: { timeoutMs?: number }) {
  return new TokenExchangeClient(TEST_OAUTH_CONFIG, { logger: createTestLogger(), ...opts });
}

describe('TokenExchangeClient', () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts the code as a form and returns the access token', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(VALID_TOKEN_BODY, { status: 200 }));

    const token = await makeClient().exchange('XYZ');

    expect(token).toEqual({ accessToken: 'abc123' });
    expect(fetchSpy).toHaveBeenCalledOnce();

    const [url, opts] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://auth.example.com/token');
    expect(opts?.method).toBe('POST');
    expect(opts?.headers).toEqual({
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    });
    expect(opts?.body).toBe(
      'grant_type=authorization_code' +
        '&client_id=test-client-id' +
        '&client_secret=test-client-secret' +
        '&redirect_uri=http%3A%2F%2Flocalhost%3A8080%2Fcallback' +
        '&code=XYZ',
    );
  });

  it('sends an overriding redirect URI when given one', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(VALID_TOKEN_BODY, { status: 200 }));

    await makeClient().exchange('XYZ', 'http://127.0.0.1:49152/callback');

    const form = new URLSearchParams(String(fetchSpy.mock.calls[0][1]?.body));
    expect(form.get('redirect_uri')).toBe('http://127.0.0.1:49152/callback');
  });

  it('throws TokenExchangeHttpError with status and body on non-2xx', async () => {
    fetchSpy.mockResolvedValueOnce(
      new Response('{"error":"bad_verification_code"}', { status: 401 }),
    );

    const err = await makeClient().exchange('XYZ').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TokenExchangeHttpError);
    expect(err).toMatchObject({ status: 401, body: '{"error":"bad_verification_code"}' });
  });

  it('throws TokenParseError when access_token is missing', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(TOKEN_BODY_WITHOUT_ACCESS_TOKEN, { status: 200 }));

    const err = await makeClient().exchange('XYZ').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TokenParseError);
    expect(err).toMatchObject({ body: '{"foo":"bar"}' });
  });

  it('throws TokenParseError on a form-encoded success body', async () => {
    fetchSpy.mockResolvedValueOnce(
      new Response('access_token=abc123&token_type=bearer', { status: 200 }),
    );

    await expect(makeClient().exchange('XYZ')).rejects.toBeInstanceOf(TokenParseError);
  });

  it('reports network failures with status 0', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

    const err = await makeClient().exchange('XYZ').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TokenExchangeHttpError);
    expect(err).toMatchObject({ status: 0, body: 'fetch failed' });
  });

  it('gives up after the timeout', async () => {
    fetchSpy.mockImplementation(
      (_url, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(Object.assign(new Error('The operation was aborted.'), { name: 'AbortError' }));
          });
        }),
    );

    await expect(makeClient({ timeoutMs: 20 }).exchange('XYZ')).rejects.toThrow(
      'Token exchange request failed: timed out after 20ms',
    );
  });

  it('makes a single attempt', async () => {
    fetchSpy.mockResolvedValue(new Response('oops', { status: 500 }));

    await expect(makeClient().exchange('XYZ')).rejects.toBeInstanceOf(TokenExchangeHttpError);
    expect(fetchSpy).toHaveBeenCalledOnce();
  });
});

describe('readAccessToken', () => {
  it('reads a string access_token', () => {
    expect(readAccessToken('{"access_token":"abc123"}')).toBe('abc123');
  });

  it.each([
    ['{"foo":"bar"}'],
    ['{"access_token":42}'],
    ['{"access_token":null}'],
    ['"abc123"'],
    ['null'],
    ['not json'],
  ])('rejects %s', (body) => {
    expect(() => readAccessToken(body)).toThrow(TokenParseError);
  });
});
