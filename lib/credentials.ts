import fs from 'fs';
import path from 'path';
import type { AppConfig } from '@/lib/config';

export const API_KEY_NAME = 'OPENROUTER_API_KEY';

/** Mounted secret file first (Docker/Kubernetes style), then the env var. */
export function resolveApiKey(config: AppConfig): string | undefined {
  const file = path.join(config.secretsDir, API_KEY_NAME);
  if (fs.existsSync(file)) {
    const secret = fs.readFileSync(file, 'utf-8').trim();
    if (secret) return secret;
  }
  return config.apiKey;
}
