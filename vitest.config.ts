import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['lambda/test/**/*.test.ts', 'packages/*/*/test/**/*.test.ts'],
    // Handlers read configuration from process.env
    unstubEnvs: true,
    restoreMocks: true
  }
});
