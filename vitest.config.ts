import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['permission-resolver/test/**/*.test.ts', 'authz-service/test/**/*.test.ts'],
    environment: 'node',
  },
});
