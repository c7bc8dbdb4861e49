import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const ORIGINAL_ENV = { ...process.env };

describe('env config', () => {
  beforeEach(() => {
    vi.resetModules();
    process.env = { ...ORIGINAL_ENV };
  });

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  it('reads PORT and FRONTEND_URL from the environment', async () => {
    process.env.PORT = '3001';
    process.env.FRONTEND_URL = 'http://localhost:5173';

    const { env } = await import('../src/config/env');

    expect(env.port).toBe(3001);
    expect(env.frontendUrl).toBe('http://localhost:5173');
  });

  it('falls back to defaults when values are missing or invalid', async () => {
    process.env.PORT = 'not-a-port';
    delete process.env.FRONTEND_URL;
    delete process.env.NODE_ENV;

    const { env } = await import('../src/config/env');

    expect(env.port).toBe(8000);
    expect(env.frontendUrl).toBe('*');
    expect(env.nodeEnv).toBe('development');
  });
});
