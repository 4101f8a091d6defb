import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { AuthorizationCodeCoordinator } from '../../src/oauth/coordinator.js';
import { CallbackReceiver } from '../../src/oauth/callback-receiver.js';
import type { OAuthConfig } from '../../src/oauth/types.js';
import {
  CallbackError,
  MissingCodeError,
  StateMismatchError,
} from '../../src/shared/errors.js';
import { TEST_OAUTH_CONFIG } from '../fixtures/oauth.js';
import { createTestLogger } from '../fixtures/streams.js';

const CONFIG: OAuthConfig = { ...TEST_OAUTH_CONFIG, redirectUri: 'http://127.0.0.1:0/callback' };

/**
 * Wires a real callback receiver to a fake browser that, like the
 * authorization server, redirects to the `redirect_uri` named in the
 * authorization URL with `query`.
 */
function setup(query: (state: string | null) => string) {
  const logger = createTestLogger();
  const receiver = new CallbackReceiver({ logger });
  const browserStatuses: number[] = [];
  const redirects: string[] = [];
  const launcher = {
    async open(url: string) {
      const params = new URL(url).searchParams;
      const redirectUri = params.get('redirect_uri') ?? '';
      redirects.push(redirectUri);
      const res = await fetch(`${redirectUri}?${query(params.get('state'))}`);
      browserStatuses.push(res.status);
      await res.text();
    },
  };
  const coordinator = new AuthorizationCodeCoordinator(CONFIG, { receiver, launcher, logger });
  return { coordinator, browserStatuses, redirects };
}

describe('Authorization code flow', () => {
  const realFetch = globalThis.fetch;
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation((input, init) => {
      if (String(input).startsWith('http://127.0.0.1')) {
        return realFetch(input, init);
      }
      return Promise.resolve(new Response('{"access_token":"tok"}', { status: 200 }));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function tokenCalls() {
    return fetchSpy.mock.calls.filter(([input]) => String(input) === CONFIG.tokenUrl);
  }

  it('exchanges the returned code for a token', async () => {
    const { coordinator, browserStatuses, redirects } = setup(
      (state) => `code=XYZ&state=${state}`,
    );

    const result = await coordinator.run({ state: 's1' });

    expect(result).toEqual({ accessToken: 'tok' });
    expect(coordinator.phase).toBe('authorized');
    expect(browserStatuses).toEqual([200]);

    const calls = tokenCalls();
    expect(calls).toHaveLength(1);
    const form = new URLSearchParams(String(calls[0][1]?.body));
    expect(form.get('grant_type')).toBe('authorization_code');
    expect(form.get('code')).toBe('XYZ');
    expect(form.get('client_id')).toBe('test-client-id');
    expect(redirects).toHaveLength(1);
    expect(redirects[0]).toMatch(/^http:\/\/127\.0\.0\.1:[1-9]\d*\/callback$/);
    expect(form.get('redirect_uri')).toBe(redirects[0]);
  });

  it('stops on an error callback without contacting the token endpoint', async () => {
    const { coordinator, browserStatuses } = setup((state) => `error=access_denied&state=${state}`);

    await expect(coordinator.run({ state: 's1' })).rejects.toThrow(CallbackError);
    expect(coordinator.phase).toBe('denied');
    expect(browserStatuses).toEqual([400]);
    expect(tokenCalls()).toHaveLength(0);
  });

  it('stops when the callback carries no code', async () => {
    const { coordinator } = setup((state) => `state=${state}`);

    await expect(coordinator.run({ state: 's1' })).rejects.toThrow(MissingCodeError);
    expect(tokenCalls()).toHaveLength(0);
  });

  it('stops on a state mismatch', async () => {
    const { coordinator, browserStatuses } = setup(() => 'code=XYZ&state=forged');

    await expect(coordinator.run({ state: 's1' })).rejects.toThrow(StateMismatchError);
    expect(coordinator.phase).toBe('mismatched');
    expect(browserStatuses).toEqual([200]);
    expect(tokenCalls()).toHaveLength(0);
  });
});
