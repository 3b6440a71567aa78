import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { lazy } from './client';

const { ctor } = vi.hoisted(() => ({ ctor: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    constructor(opts: unknown) {
      ctor(opts);
    }
  },
}));

async function freshClientModule() {
  vi.resetModules();
  return import('./client');
}

describe('lazy', () => {
  it('runs the initializer once', () => {
    const init = vi.fn(() => ({ id: 1 }));
    const get = lazy(init);
    expect(get()).toBe(get());
    expect(init).toHaveBeenCalledTimes(1);
  });

  it('does not cache a failed initialization', () => {
    const init = vi.fn()
      .mockImplementationOnce(() => { throw new Error('not yet'); })
      .mockImplementationOnce(() => 'ready');
    const get = lazy(init);
    expect(() => get()).toThrow('not yet');
    expect(get()).toBe('ready');
    expect(get()).toBe('ready');
    expect(init).toHaveBeenCalledTimes(2);
  });
});

describe('getClient', () => {
  beforeEach(() => {
    ctor.mockClear();
    vi.stubEnv('OPENROUTER_API_KEY', 'test-key');
    vi.stubEnv('OPENROUTER_BASE_URL', '');
    vi.stubEnv('SECRETS_DIR', '/nonexistent/secrets-for-tests');
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('builds one OpenRouter client and reuses it', async () => {
    const { getClient } = await freshClientModule();

    const first = getClient();
    const second = getClient();

    expect(second).toBe(first);
    expect(ctor).toHaveBeenCalledTimes(1);
    expect(ctor).toHaveBeenCalledWith({ baseURL: 'https://openrouter.ai/api/v1', apiKey: 'test-key' });
  });

  it('throws a configuration error when no key is found', async () => {
    vi.stubEnv('OPENROUTER_API_KEY', '');
    const { getClient } = await freshClientModule();

    expect(() => getClient()).toThrow(
      'OPENROUTER_API_KEY not found. Mount it as a secret or set it in the environment.',
    );
    expect(ctor).not.toHaveBeenCalled();
  });

  it('picks the key up once it is configured', async () => {
    vi.stubEnv('OPENROUTER_API_KEY', '');
    const { getClient } = await freshClientModule();
    expect(() => getClient()).toThrow();

    vi.stubEnv('OPENROUTER_API_KEY', 'test-key');
    getClient();
    getClient();

    expect(ctor).toHaveBeenCalledTimes(1);
  });
});
