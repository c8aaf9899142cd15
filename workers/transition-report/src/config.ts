import { z } from 'zod';
import { DEFAULT_MIN_DURATION, ValidationError } from '@burrow/core';

const stateListSchema = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
      .map(Number)
  )
  .pipe(z.array(z.number().int()).min(1));

/**
 * Transition report configuration, read from the environment
 */
export const reportConfigSchema = z.object({
  SESSION_FILE: z.string().min(1).describe('Path of the session JSON file'),
  REPORT_OUTPUT_FILE: z.string().min(1).optional().describe('Write the report here instead of stdout'),
  TRANSITION_MIN_DURATION: z.coerce
    .number()
    .nonnegative()
    .default(DEFAULT_MIN_DURATION)
    .describe('Seconds a dwell must exceed to count as a transition'),
  TRANSITION_ALLOWED_STATES: stateListSchema.optional().describe('Comma-separated state codes'),
  LOG_LEVEL: z.string().default('info')
});

export interface ReportConfig {
  sessionFile: string;
  outputFile?: string;
  minDuration: number;
  allowedStates?: number[];
  logLevel: string;
}

export function loadReportConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const parsed = reportConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw ValidationError.fromZod('report configuration', parsed.error);
  }

  return {
    sessionFile: parsed.data.SESSION_FILE,
    outputFile: parsed.data.REPORT_OUTPUT_FILE,
    minDuration: parsed.data.TRANSITION_MIN_DURATION,
    allowedStates: parsed.data.TRANSITION_ALLOWED_STATES,
    logLevel: parsed.data.LOG_LEVEL
  };
}
