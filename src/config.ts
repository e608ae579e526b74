import type { ReportOptions, ResolvedReportConfig, ResolvedServerConfig, ServerOptions } from './types';

export const DEFAULT_TRACES_DIR = 'target/pw-traces';
export const DEFAULT_PROJECT_NAME = 'Playwright Tests';
export const DEFAULT_SERVER_PORT = 8080;

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * Fill report options from the environment and defaults.
 *
 * Env:
 * - PW_OUTPUT_DIRECTORY: where archives are written and scanned
 * - PW_PROJECT_NAME: report heading
 */
export function resolveReportConfig(options: ReportOptions = {}, env: Env = process.env): ResolvedReportConfig {
  const tracesDir = nonEmpty(options.tracesDir) ?? nonEmpty(env.PW_OUTPUT_DIRECTORY) ?? DEFAULT_TRACES_DIR;
  return {
    tracesDir,
    outputDir: nonEmpty(options.outputDir) ?? tracesDir,
    projectName: nonEmpty(options.projectName) ?? nonEmpty(env.PW_PROJECT_NAME) ?? DEFAULT_PROJECT_NAME,
    copyViewerAssets: options.copyViewerAssets ?? true,
  };
}

export function parsePort(value: string | number): number {
  const port = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port "${value}". Use an integer between 0 and 65535.`);
  }
  return port;
}

/**
 * Env: PW_SERVER_PORT, PW_SERVER_DIR
 */
export function resolveServerConfig(options: ServerOptions = {}, env: Env = process.env): ResolvedServerConfig {
  const rawPort = options.port ?? nonEmpty(env.PW_SERVER_PORT);
  return {
    port: rawPort === undefined ? DEFAULT_SERVER_PORT : parsePort(rawPort),
    dir: nonEmpty(options.dir) ?? nonEmpty(env.PW_SERVER_DIR) ?? DEFAULT_TRACES_DIR,
  };
}

/** Directory the tracing fixture writes archives to */
export function resolveTraceOutputDir(env: Env = process.env): string {
  return nonEmpty(env.PW_OUTPUT_DIRECTORY) ?? DEFAULT_TRACES_DIR;
}
