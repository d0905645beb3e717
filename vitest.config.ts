import { defineConfig } from 'vitest/config';

// Message timestamps render in local time; pin it so expectations are stable.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    env: { TZ: 'UTC' },
    restoreMocks: true,
    unstubEnvs: true,
  },
});
