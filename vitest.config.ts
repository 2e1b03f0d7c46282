import { defineConfig } from 'vitest/config';

process.env.AUTH_JWT_SECRET ??= 'test_jwt_secret_value_that_is_long_enough_1234567890';
process.env.TOKEN_HASH_SECRET ??= 'test_token_hash_secret_for_vitest';
process.env.LOG_LEVEL ??= 'silent';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.{js,ts}',
        '**/*.d.ts',
        '**/index.ts',
        '**/testing/**',
      ],
    },
  },
});
