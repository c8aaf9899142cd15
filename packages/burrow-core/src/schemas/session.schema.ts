import { z } from 'zod';
import { stateCodeSchema } from './state.schema';

/**
 * One mouse track row: position in pixels and the state code of the frame
 */
export const mouseTrackRowSchema = z.tuple([
  z.number().describe('Position X'),
  z.number().describe('Position Y'),
  stateCodeSchema.describe('Status')
]);

export type MouseTrackRow = z.infer<typeof mouseTrackRowSchema>;

/**
 * Burrow length over time - frame indices and lengths in pixels
 */
export const burrowTrackSchema = z
  .object({
    times: z.array(z.number().nonnegative()).describe('Frame indices'),
    lengths: z.array(z.number().nonnegative()).describe('Burrow lengths in pixels')
  })
  .refine(track => track.times.length === track.lengths.length, {
    message: 'times and lengths must have the same number of entries'
  });

export type BurrowTrack = z.infer<typeof burrowTrackSchema>;

/**
 * One recorded session as provided by the tracking pipeline
 */
export const sessionDataSchema = z.object({
  fps: z.number().positive().finite().describe('Video frame rate'),
  pixelSizeCm: z.number().positive().finite().describe('Length of one pixel in centimeters'),
  mouseTrajectory: z
    .array(mouseTrackRowSchema)
    .optional()
    .describe('Per-frame mouse rows; absent until the trajectory has been determined'),
  burrowTracks: z.array(burrowTrackSchema).optional().describe('Burrow length tracks')
});

export type SessionData = z.infer<typeof sessionDataSchema>;
