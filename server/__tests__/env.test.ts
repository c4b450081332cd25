import { describe, it, expect } from '@jest/globals';
import { parseEnv } from '../config/env';

const SECRET = 'test-secret-test-secret-test-secret';

describe('parseEnv', () => {
  it('accepts the router defaults', () => {
    const env = parseEnv({ SESSION_SECRET: SECRET });

    expect(env.ROUTER_MAX_ATTEMPTS).toBe(3);
    expect(env.ROUTER_ATTEMPT_TIMEOUT_MS).toBe(8_000);
    expect(env.ROUTER_DEADLINE_MS).toBe(30_000);
  });

  it('rejects a deadline that cannot hold every attempt', () => {
    expect(() => parseEnv({ SESSION_SECRET: SECRET, ROUTER_ATTEMPT_TIMEOUT_MS: '15000' }))
      .toThrow('ROUTER_DEADLINE_MS: ROUTER_DEADLINE_MS must cover ROUTER_MAX_ATTEMPTS timed-out attempts plus their backoff');
  });

  it('accepts a longer timeout with a matching deadline', () => {
    const env = parseEnv({ SESSION_SECRET: SECRET, ROUTER_ATTEMPT_TIMEOUT_MS: '15000', ROUTER_DEADLINE_MS: '50000' });
    expect(env.ROUTER_DEADLINE_MS).toBe(50_000);
  });
});
