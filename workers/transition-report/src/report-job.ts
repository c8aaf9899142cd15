import fs from 'fs/promises';
import { createLogger } from '@burrow/core';
import type { ReportConfig } from './config';
import { buildTransitionReport, type TransitionReport } from './report-builder';
import { loadSession } from './session-loader';

/**
 * Load the configured session, build its report and write it out
 */
export async function runTransitionReport(
  config: ReportConfig,
  write: (text: string) => void = text => process.stdout.write(text)
): Promise<TransitionReport> {
  const logger = createLogger('transition-report', { level: config.logLevel });

  logger.info({ sessionFile: config.sessionFile }, 'Building transition report');

  const session = await loadSession(config.sessionFile);
  const report = buildTransitionReport(session, {
    minDuration: config.minDuration,
    allowedStates: config.allowedStates
  });

  const text = `${JSON.stringify(report, null, 2)}\n`;
  if (config.outputFile) {
    await fs.writeFile(config.outputFile, text, 'utf-8');
    logger.info({ outputFile: config.outputFile }, 'Report written');
  } else {
    write(text);
  }

  logger.info(
    { frames: report.frameCount, nodes: report.nodes.length, edges: report.edges.length },
    'Transition report complete'
  );

  return report;
}
