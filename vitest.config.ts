import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      ANALYSIS_LOG_FILE: path.join(os.tmpdir(), 'listening-agent-tests', 'analysis.txt'),
    },
  },
});
