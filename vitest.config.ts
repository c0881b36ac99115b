import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    // The container is a module-level singleton; keep files isolated.
    isolate: true,
    pool: 'forks',
  },
});
