import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      LEDGER_UNLOCK_MODE: 'linear',
      LEDGER_DB_PATH: ':memory:',
    },
  },
});
