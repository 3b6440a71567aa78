import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

// Blank env vars (KEY= in .env) count as unset.
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  OPENROUTER_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default('https://openrouter.ai/api/v1')),
  VISION_MODEL: z.preprocess(blankToUndefined, z.string().trim().default('anthropic/claude-sonnet-4')),
  SECRETS_DIR: z.preprocess(blankToUndefined, z.string().default('/run/secrets')),
});

export type AppConfig = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  secretsDir: string;
};

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration (${detail})`);
  }
  const e = parsed.data;
  return {
    apiKey: e.OPENROUTER_API_KEY,
    baseUrl: e.OPENROUTER_BASE_URL,
    model: e.VISION_MODEL,
    secretsDir: e.SECRETS_DIR,
  };
}
