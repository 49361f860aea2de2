import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const r = (p: string) => path.resolve(path.dirname(fileURLToPath(import.meta.url)), p);

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: { TZ: 'UTC' }
  },
  resolve: {
    alias: {
      '@shared': r('src/shared'),
      '@backend': r('src/backend')
    }
  }
});
