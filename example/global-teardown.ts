import { generateReport } from '../src';

/**
 * Refresh the aggregate dashboard once the whole run has finished
 */
async function globalTeardown(): Promise<void> {
  const reportPath = generateReport({ projectName: 'Playwright Demo Suite' });
  console.log(`\n📊 Trace report: ${reportPath}`);
}

export default globalTeardown;
