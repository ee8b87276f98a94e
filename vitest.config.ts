import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/tests/**/*.test.ts'],
    // Weak-reference suites trigger collection through `globalThis.gc`.
    pool: 'forks',
    poolOptions: {
      forks: {
        execArgv: ['--expose-gc']
      }
    }
  }
});
