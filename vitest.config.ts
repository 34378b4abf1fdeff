import { defineConfig } from 'vitest/config';

export const globalConfig = {
  test: {
    environment: 'node',
    restoreMocks: true,
    testTimeout: 20_000,
  },
} as const;

export default defineConfig(globalConfig);
