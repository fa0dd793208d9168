import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['src/__tests__/setup.ts'],
    env: {
      NAVIDROME_URL: 'http://localhost:4533',
      NAVIDROME_USER: 'test-user',
      NAVIDROME_PASSWORD: 'test-password',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_ID: '-100123',
      DATA_DIR: './data',
      DATABASE_PATH: ':memory:',
      LOG_LEVEL: 'silent'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        'src/cli.ts',           // CLI entry point
        'src/index.ts',         // Server entry point
        'src/load-env.ts',
        'src/**/types.ts'       // Type definition files
      ]
    }
  }
});
