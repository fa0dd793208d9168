import { promises as fs } from 'node:fs';
import { existsSync } from 'node:fs';
import path from 'node:path';

import type { AppEnv } from './config.js';
import { logger } from './logger.js';

/**
 * Create the data directory and the parent directories of the cache and
 * database files, plus a commented .env template in the data directory.
 */
export async function initializeDirectories(env: AppEnv): Promise<void> {
  const dirs = new Set([
    env.DATA_DIR,
    path.dirname(env.CACHE_PATH),
    ...(env.DATABASE_PATH === ':memory:' ? [] : [path.dirname(env.DATABASE_PATH)])
  ]);

  for (const dir of dirs) {
    await fs.mkdir(dir, { recursive: true });
  }
  logger.debug({ dirs: [...dirs] }, 'ensuring directories exist');

  const envPath = path.join(env.DATA_DIR, '.env');
  if (existsSync(envPath)) {
    logger.debug({ path: envPath }, 'found .env in data directory');
    return;
  }

  try {
    await fs.writeFile(envPath, getDefaultEnvContent(), 'utf-8');
    logger.info({ path: envPath }, 'created default .env in data directory');
  } catch (error) {
    logger.warn({ path: envPath, err: error }, 'failed to create .env file');
  }
}

/**
 * Settings the server cannot work without, as human-readable problems
 */
export function checkConfiguration(env: AppEnv): string[] {
  const problems: string[] = [];
  if (!env.NAVIDROME_URL) problems.push('NAVIDROME_URL is not set');
  if (!env.NAVIDROME_USER) problems.push('NAVIDROME_USER is not set');
  if (!env.NAVIDROME_PASSWORD) problems.push('NAVIDROME_PASSWORD is not set');
  if (!env.TELEGRAM_BOT_TOKEN) problems.push('TELEGRAM_BOT_TOKEN is not set');
  if (!env.TELEGRAM_CHAT_ID) problems.push('TELEGRAM_CHAT_ID is not set');
  return problems;
}

function getDefaultEnvContent(): string {
  return `# Navidrome Album Digest configuration
# This file is auto-generated. Uncomment and fill in the values below.

# Required: Navidrome server
# NAVIDROME_URL=http://localhost:4533
# NAVIDROME_USER=admin
# NAVIDROME_PASSWORD=change-me

# Required: Telegram
# TELEGRAM_BOT_TOKEN=123456:replace-me
# TELEGRAM_CHAT_ID=-1001234567890

# Optional: schedule (default: 8am every day)
# DIGEST_CRON=0 8 * * *
# RUN_ON_STARTUP=false
`;
}
