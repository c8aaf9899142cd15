import { z } from 'zod';
import { DEFAULT_MIN_DURATION } from '../constants/limits';
import { stateCodeSchema } from './state.schema';

/**
 * Transition extraction options
 */
export const transitionOptionsSchema = z.object({
  timeScale: z.number().positive().finite().describe('Duration of one frame (e.g. seconds per frame)'),
  allowedCodes: z
    .array(stateCodeSchema)
    .optional()
    .describe('Only transitions between these codes are recorded; all codes when absent'),
  minDuration: z
    .number()
    .nonnegative()
    .finite()
    .default(DEFAULT_MIN_DURATION)
    .describe('Dwells must last strictly longer than this to be recorded')
});

export type TransitionOptions = z.input<typeof transitionOptionsSchema>;
export type ResolvedTransitionOptions = z.output<typeof transitionOptionsSchema>;
