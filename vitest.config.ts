import { tmpdir } from 'os';
import { join } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      SEARCHDEPLOY_DEBUG_LOG: join(tmpdir(), 'searchdeploy-test', 'debug.log'),
    },
  },
});
