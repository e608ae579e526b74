import { defineConfig, devices } from '@playwright/test';

/**
 * Example configuration for the tracing fixture.
 *
 *   npx playwright test -c example
 *   npx trace-report-serve
 */
export default defineConfig({
  testDir: './',
  timeout: 30000,

  projects: [
    {
      name: 'Desktop Chrome',
      use: { ...devices['Desktop Chrome'] },
    },
  ],

  use: {
    headless: true,
    viewport: { width: 1280, height: 720 },
    // The fixture records its own trace per test; a context holds one recording at a time
    trace: 'off',
  },

  globalTeardown: './global-teardown.ts',

  reporter: [['list']],
});
