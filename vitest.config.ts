import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    // Keep tests independent of a developer's .env
    env: {
      SETLISTFM_API_KEY: 'test-key',
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        '*.config.ts',
        'src/cli.ts',           // CLI entry point
        'src/**/types.ts',      // Type definition files
      ],
    },
  },
});
