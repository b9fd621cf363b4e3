import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      // Keep the file logger away from the real home directory
      SECTOOLS_DIR: join(tmpdir(), 'sectools-test-home'),
    },
  },
});
