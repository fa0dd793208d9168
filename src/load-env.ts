/**
 * Loads .env files before anything reads configuration.
 * Imported first by the CLI; must not import config or logger.
 */

import 'dotenv/config';
import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { join } from 'node:path';

// Docker setups keep their .env next to the data
const dataEnvPath = join(process.env.DATA_DIR || './data', '.env');
if (existsSync(dataEnvPath)) {
  dotenvConfig({ path: dataEnvPath, override: true });
}
