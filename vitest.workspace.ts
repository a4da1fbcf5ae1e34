import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    test: {
      name: 'api',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
  'apps/web/vite.config.ts',
]);
