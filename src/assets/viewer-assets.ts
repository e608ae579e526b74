/**
 * Locates the Playwright Trace Viewer static bundle and copies it next to
 * the report, so `trace/index.html?trace=../<file>.zip` works offline.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const VIEWER_DIR_NAME = 'trace';

export interface LocateViewerOptions {
  /** Resolves `playwright-core/package.json`; swapped out in tests */
  resolvePackageJson?: () => string;
  /** npx cache searched when playwright-core is not resolvable */
  npxCacheDir?: string;
}

function isViewerDir(dir: string): boolean {
  return fs.existsSync(path.join(dir, 'index.html'));
}

function fromPlaywrightCore(resolvePackageJson: () => string): string | undefined {
  try {
    const dir = path.join(path.dirname(resolvePackageJson()), 'lib', 'vite', 'traceViewer');
    return isViewerDir(dir) ? dir : undefined;
  } catch {
    return undefined;
  }
}

function fromNpxCache(root: string): string | undefined {
  const pending = [root];
  while (pending.length > 0) {
    const dir = pending.shift();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      continue;
    }

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const child = path.join(dir, entry.name);
      if (entry.name === 'traceViewer' && isViewerDir(child)) return child;
      pending.push(child);
    }
  }
  return undefined;
}

/**
 * Find the traceViewer directory: first through playwright-core's own
 * install, then in the npx cache (`~/.npm/_npx`).
 */
export function locateViewerAssets(options: LocateViewerOptions = {}): string | undefined {
  const resolvePackageJson = options.resolvePackageJson ?? (() => require.resolve('playwright-core/package.json'));
  const npxCacheDir = options.npxCacheDir ?? path.join(os.homedir(), '.npm', '_npx');

  return fromPlaywrightCore(resolvePackageJson) ?? fromNpxCache(npxCacheDir);
}

/**
 * Recursively copy the regular files under `sourceDir` into `destDir`
 */
export function copyTree(sourceDir: string, destDir: string): void {
  fs.mkdirSync(destDir, { recursive: true });
  for (const entry of fs.readdirSync(sourceDir, { withFileTypes: true })) {
    const from = path.join(sourceDir, entry.name);
    const to = path.join(destDir, entry.name);
    if (entry.isDirectory()) {
      copyTree(from, to);
    } else if (entry.isFile()) {
      fs.copyFileSync(from, to);
    }
  }
}

/**
 * Copy the viewer into `<outputDir>/trace/`. Never fatal: when the assets
 * cannot be found or copied a warning is printed and undefined returned.
 */
export function copyViewerAssets(outputDir: string, options: LocateViewerOptions = {}): string | undefined {
  const source = locateViewerAssets(options);
  if (!source) {
    console.warn('⚠️  Could not locate playwright-core traceViewer assets.');
    console.warn('   Offline viewer links in the report will not work.');
    return undefined;
  }

  const dest = path.join(outputDir, VIEWER_DIR_NAME);
  try {
    copyTree(source, dest);
  } catch (err) {
    console.warn(`⚠️  Could not copy trace viewer assets to ${dest}:`, err instanceof Error ? err.message : err);
    return undefined;
  }

  console.log(`   Trace viewer assets copied → ${path.resolve(dest)}`);
  return dest;
}
