import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

vi.mock('../logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}));

import { APP_ENV, type AppEnv } from '../config.js';
import { checkConfiguration, initializeDirectories } from '../init.js';

describe('initializeDirectories', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(tmpdir(), 'digest-init-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const envFor = (overrides: Partial<AppEnv>): AppEnv => ({ ...APP_ENV, ...overrides });

  it('creates the data, cache and database directories and an .env template', async () => {
    const env = envFor({
      DATA_DIR: path.join(root, 'data'),
      CACHE_PATH: path.join(root, 'cache', 'albums.json'),
      DATABASE_PATH: path.join(root, 'db', 'digest.db')
    });

    await initializeDirectories(env);

    expect((await fs.readdir(root)).sort()).toEqual(['cache', 'data', 'db']);
    const template = await fs.readFile(path.join(root, 'data', '.env'), 'utf-8');
    expect(template.startsWith('# Navidrome Album Digest configuration\n')).toBe(true);
  });

  it('keeps an existing .env file', async () => {
    const dataDir = path.join(root, 'data');
    await fs.mkdir(dataDir);
    await fs.writeFile(path.join(dataDir, '.env'), 'NAVIDROME_URL=http://music.local:4533\n', 'utf-8');

    await initializeDirectories(envFor({ DATA_DIR: dataDir, CACHE_PATH: path.join(dataDir, 'albums.json') }));

    expect(await fs.readFile(path.join(dataDir, '.env'), 'utf-8')).toBe('NAVIDROME_URL=http://music.local:4533\n');
  });
});

describe('checkConfiguration', () => {
  it('reports nothing for the test configuration', () => {
    expect(checkConfiguration(APP_ENV)).toEqual([]);
  });

  it('lists every missing required setting', () => {
    const env: AppEnv = {
      ...APP_ENV,
      NAVIDROME_URL: '',
      NAVIDROME_PASSWORD: '',
      TELEGRAM_CHAT_ID: ''
    };

    expect(checkConfiguration(env)).toEqual([
      'NAVIDROME_URL is not set',
      'NAVIDROME_PASSWORD is not set',
      'TELEGRAM_CHAT_ID is not set'
    ]);
  });
});
