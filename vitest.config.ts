import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      TELEGRAM_TOKEN: 'test-telegram-token',
      OPENAI_API_KEY: 'test-openai-key',
      BQ_PROJECT: 'test-project',
      BQ_DATASET: 'shop',
      BQ_TABLE: 'transactions',
    },
  },
});
