#!/usr/bin/env node

import * as fs from 'fs';
import { generateReport } from '../generators';
import { tagWithStatus } from '../naming';
import type { TagStatus } from '../types';

function printUsage(): void {
  console.log(`
Usage: trace-report <command> [options]

Commands:
  generate  Build index.html from the trace archives in a directory
  tag       Tag a trace archive with a PASS/FAIL status

Run trace-report <command> --help for command-specific help.
`);
}

function parseFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function isTagStatus(value: string): value is TagStatus {
  return value === 'pass' || value === 'fail';
}

function runGenerate(args: string[]): void {
  if (hasFlag(args, '--help')) {
    console.log(`
Usage: trace-report generate [options]

Scan a directory for *.zip trace archives and write an HTML dashboard.

Options:
  --traces-dir <path>   Directory to scan (default: $PW_OUTPUT_DIRECTORY or target/pw-traces)
  --output-dir <path>   Where to write index.html (default: the traces directory)
  --project <name>      Name shown in the report header (default: $PW_PROJECT_NAME or "Playwright Tests")
  --no-assets           Skip copying the offline Trace Viewer
  --help                Show this help
`);
    return;
  }

  const reportPath = generateReport({
    tracesDir: parseFlag(args, '--traces-dir'),
    outputDir: parseFlag(args, '--output-dir'),
    projectName: parseFlag(args, '--project'),
    copyViewerAssets: !hasFlag(args, '--no-assets'),
  });

  console.log(`\n📊 Trace report: ${reportPath}`);
  console.log('   Serve with the offline viewer: npx trace-report-serve');
}

function runTag(args: string[]): void {
  if (hasFlag(args, '--help')) {
    console.log(`
Usage: trace-report tag <path> --status <pass|fail>

Rename <slug>-<epoch>.zip to <slug>-<STATUS>-<epoch>.zip. An already tagged
archive gets its status replaced.

Options:
  --status <status>   pass or fail (required)
  --help              Show this help
`);
    return;
  }

  const tracePath = args[1];
  const status = parseFlag(args, '--status')?.toLowerCase();

  if (!tracePath || tracePath.startsWith('-')) {
    console.error('Error: a trace archive path is required.');
    console.error('Example: trace-report tag target/pw-traces/login-1700000000000.zip --status pass');
    process.exitCode = 1;
    return;
  }

  if (!status || !isTagStatus(status)) {
    console.error(`Error: Invalid status "${status ?? ''}". Use pass or fail.`);
    process.exitCode = 1;
    return;
  }

  if (!fs.existsSync(tracePath)) {
    console.error(`Error: Trace archive not found: ${tracePath}`);
    process.exitCode = 1;
    return;
  }

  console.log(tagWithStatus(tracePath, status));
}

/**
 * Dispatch one command. Usage errors set `process.exitCode`; anything else
 * that fails is thrown to the caller.
 */
export async function run(args: string[]): Promise<void> {
  const command = args[0];
  switch (command) {
    case 'generate':
      runGenerate(args);
      break;
    case 'tag':
      runTag(args);
      break;
    case '--help':
    case '-h':
    case undefined:
      printUsage();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exitCode = 1;
  }
}

export function main(args: string[] = process.argv.slice(2)): Promise<void> {
  return run(args).catch(err => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}

if (require.main === module) {
  void main();
}
