import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      DISCORD_DEMO: 'true',
      DB_DIALECT: 'sqlite',
      SQLITE_PATH: ':memory:',
    },
  },
});
