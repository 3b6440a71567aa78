import OpenAI from 'openai';
import { loadConfig } from '@/lib/config';
import { resolveApiKey, API_KEY_NAME } from '@/lib/credentials';
import { ConfigError } from '@/lib/errors';

/**
 * One-time initializer: the first successful result is kept for the life of
 * the process. A throwing init is not cached, so the next call tries again.
 */
export function lazy<T>(init: () => T): () => T {
  let value: { v: T } | null = null;
  return () => {
    if (!value) value = { v: init() };
    return value.v;
  };
}

export const getClient = lazy(() => {
  const config = loadConfig();
  const apiKey = resolveApiKey(config);
  if (!apiKey) {
    console.error('[client] no API key found');
    throw new ConfigError(`${API_KEY_NAME} not found. Mount it as a secret or set it in the environment.`);
  }
  return new OpenAI({ baseURL: config.baseUrl, apiKey });
});
