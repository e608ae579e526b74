/**
 * Playwright Test fixture that records one trace archive per test.
 *
 * Archives land in `$PW_OUTPUT_DIRECTORY` (default `target/pw-traces`) as
 * `<slug>-<epoch>.zip` and are renamed to `<slug>-PASS|FAIL-<epoch>.zip`
 * once the test finishes, which is the naming `trace-report generate` reads.
 *
 * Leave Playwright's own `use.trace` option off when using this fixture:
 * a context can only record one trace at a time. Group actions with the
 * `step` fixture rather than `test.step`, which does not write groups into
 * a trace started on the context. HTTP calls made through `api` share the
 * context and land in the same archive.
 *
 *   import { test, expect } from 'trace-archive-report/fixtures';
 *
 *   test('homepage', async ({ page, step, api, captureScreenshot }) => {
 *     await step('open', () => page.goto('https://example.com'));
 *     await captureScreenshot('landing');
 *     expect((await api.get('https://example.com/health')).ok()).toBe(true);
 *   });
 */

import * as fs from 'fs';
import { test as base, expect, type APIRequestContext } from '@playwright/test';
import { resolveTraceOutputDir } from '../config';
import { buildTracePath } from '../naming';
import { attachScreenshot, finalizeTrace, outcomeOf, traceStep, traceTitle } from './trace-lifecycle';

export type TraceStepFn = <T>(name: string, body: () => T | Promise<T>) => Promise<T>;

export interface TraceFixtures {
  /** Where this test's archive is written before tagging */
  tracePath: string;
  /** Runs a callback inside a named group of the trace */
  step: TraceStepFn;
  /** The context's own HTTP client; its calls are recorded in the trace */
  api: APIRequestContext;
  /** Attaches a labelled viewport screenshot to the test */
  captureScreenshot: (label: string) => Promise<Buffer | undefined>;
}

export const test = base.extend<TraceFixtures>({
  tracePath: [
    async ({ context }, use, testInfo) => {
      const outputDir = resolveTraceOutputDir();
      fs.mkdirSync(outputDir, { recursive: true });

      const tracePath = buildTracePath(traceTitle(testInfo), outputDir, Date.now());
      await context.tracing.start({ title: testInfo.title, screenshots: true, snapshots: true, sources: true });

      await use(tracePath);

      const saved = await finalizeTrace(context.tracing, tracePath, outcomeOf(testInfo));
      if (saved) {
        await testInfo.attach('trace', { path: saved, contentType: 'application/zip' });
      }
    },
    { auto: true },
  ],

  // Depends on tracePath so the recording is running before the first group opens
  step: async ({ context, tracePath: _tracePath }, use) => {
    await use((name, body) => traceStep(context.tracing, name, body));
  },

  api: async ({ context }, use) => {
    await use(context.request);
  },

  captureScreenshot: async ({ page }, use, testInfo) => {
    await use(label => attachScreenshot(page, testInfo, label));
  },
});

export { expect };
