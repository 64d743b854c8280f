import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolvePath = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'karaoke-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@config': resolvePath('./src/config'),
      '@lyricsync/platform-core': resolvePath('../../platform-core/src'),
      '@lyricsync/shared-contracts': resolvePath('../../shared/contracts/src'),
      '@lyricsync/test-utils': resolvePath('../../shared/test-utils/src'),
    },
  },
});
