#!/usr/bin/env node

import * as path from 'path';
import { resolveServerConfig } from '../config';
import { startStaticServer } from '../server/static-server';
import type { ServerOptions } from '../types';

function printUsage(): void {
  console.log(`
Usage: trace-report-serve [options]

Serves the trace report directory over HTTP so the offline Trace Viewer can load archives.

Options:
  --port <port>         Port to serve on (default: $PW_SERVER_PORT or 8080)
  --dir <path>          Directory to serve (default: $PW_SERVER_DIR or target/pw-traces)
  -h, --help            Show this help message

Examples:
  trace-report-serve
  trace-report-serve --dir ./target/pw-traces --port 3000
`);
}

function parseArgs(argv: string[]): ServerOptions | null {
  const args = argv.slice(2);

  if (args.includes('-h') || args.includes('--help')) {
    printUsage();
    return null;
  }

  const options: ServerOptions = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--port') {
      const value = args[++i];
      if (value !== undefined) options.port = Number(value);
    } else if (arg === '--dir') {
      options.dir = args[++i];
    }
  }
  return options;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv);
  if (!options) return;

  const config = resolveServerConfig(options);
  const server = await startStaticServer(config);
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : config.port;

  console.log(`\n  Trace Viewer HTTP server started.`);
  console.log(`  Serving : ${path.resolve(config.dir)}`);
  console.log(`  URL     : http://localhost:${port}`);
  console.log(`  Press Ctrl+C to stop.\n`);
}

main().catch((err: unknown) => {
  if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
    console.error(`Error: Port is already in use. Try --port <other-port>`);
  } else {
    console.error('Error:', err instanceof Error ? err.message : err);
  }
  process.exitCode = 1;
});
