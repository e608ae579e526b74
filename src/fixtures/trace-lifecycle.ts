import * as fs from 'fs';
import type { TestInfo } from '@playwright/test';
import type { TagStatus } from '../types';
import { tagWithStatus } from '../naming';

/** The slice of `context.tracing` needed to finish a recording */
export interface TraceRecorder {
  stop(options: { path: string }): Promise<void>;
}

/** The slice of `context.tracing` that opens and closes action groups */
export interface TraceGrouper {
  group(name: string): Promise<void>;
  groupEnd(): Promise<void>;
}

export interface ScreenshotSource {
  screenshot(options?: { fullPage?: boolean }): Promise<Buffer>;
}

export type TraceTitleSource = Pick<TestInfo, 'titlePath' | 'title'> & {
  project?: { name: string };
};

/**
 * A test passes when it ended the way it was expected to, so an expected
 * failure (`test.fail()`) is tagged PASS.
 */
export function outcomeOf(testInfo: Pick<TestInfo, 'status' | 'expectedStatus'>): TagStatus {
  return testInfo.status === testInfo.expectedStatus ? 'pass' : 'fail';
}

/**
 * Title used for the archive name: project, describe blocks and test title,
 * without the file name `titlePath` starts with. The project is left out
 * when it has no name.
 */
export function traceTitle(testInfo: TraceTitleSource): string {
  const parts = testInfo.titlePath.slice(1);
  const title = parts.length > 0 ? parts.join(' ') : testInfo.title;
  const projectName = testInfo.project?.name.trim();
  return projectName ? `${projectName} ${title}` : title;
}

/**
 * Run `body` inside a named group of the context trace, so its actions show
 * up collapsed under `name` in the Trace Viewer. The group is closed whether
 * `body` resolves or throws; a tracing error while opening or closing it
 * only warns.
 */
export async function traceStep<T>(tracing: TraceGrouper, name: string, body: () => T | Promise<T>): Promise<T> {
  const startedAt = Date.now();
  console.log(`  => ${name}`);

  try {
    await tracing.group(name);
  } catch (err) {
    console.warn('⚠️  Could not open trace group:', err instanceof Error ? err.message : err);
  }

  try {
    const result = await body();
    console.log(`     ok (${Date.now() - startedAt}ms)`);
    return result;
  } catch (err) {
    console.log(`     FAILED: ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  } finally {
    try {
      await tracing.groupEnd();
    } catch (err) {
      console.warn('⚠️  Could not close trace group:', err instanceof Error ? err.message : err);
    }
  }
}

/**
 * Take a viewport screenshot and attach it to the test under `label`.
 * Returns the PNG bytes, or undefined after a warning when it failed.
 */
export async function attachScreenshot(
  page: ScreenshotSource,
  testInfo: Pick<TestInfo, 'attach'>,
  label: string,
): Promise<Buffer | undefined> {
  let body: Buffer;
  try {
    body = await page.screenshot({ fullPage: false });
  } catch (err) {
    console.warn('⚠️  Screenshot failed:', err instanceof Error ? err.message : err);
    return undefined;
  }

  await testInfo.attach(label, { body, contentType: 'image/png' });
  console.log(`  [screenshot] ${label} (${body.length} bytes)`);
  return body;
}

/**
 * Stop tracing into `tracePath` and tag the archive with the outcome.
 * Returns the final path on disk, or undefined when no archive was written.
 */
export async function finalizeTrace(
  tracing: TraceRecorder,
  tracePath: string,
  outcome: TagStatus,
): Promise<string | undefined> {
  try {
    await tracing.stop({ path: tracePath });
  } catch (err) {
    console.warn(`⚠️  Could not stop tracing for ${tracePath}:`, err instanceof Error ? err.message : err);
    return undefined;
  }

  if (!fs.existsSync(tracePath)) return undefined;

  const finalPath = tagWithStatus(tracePath, outcome);
  console.log(`Trace saved: ${finalPath}`);
  return finalPath;
}
