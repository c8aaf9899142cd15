import { createLogger } from '@burrow/core';
import { config } from 'dotenv';
import { loadReportConfig } from './config';
import { runTransitionReport } from './report-job';

// Load environment variables
config();

const logger = createLogger('transition-report-main');

/**
 * Transition report job
 * Runs once over a recorded session and exits
 */
async function main() {
  const reportConfig = loadReportConfig();
  await runTransitionReport(reportConfig);
}

if (require.main === module) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      logger.error({ error }, 'Transition report failed');
      process.exit(1);
    });
}

export { buildTransitionReport, formatDwell } from './report-builder';
export { loadReportConfig } from './config';
export { loadSession } from './session-loader';
export { runTransitionReport } from './report-job';
