import { DEFAULT_STATE_CATEGORIES } from '../constants/states';
import { PrecursorMissingError, ValidationError } from '../errors';
import { createLogger } from '../logger';
import { MouseTrack } from '../models/mouse-track';
import { sessionDataSchema, type SessionData } from '../schemas/session.schema';
import type { StateCategoryMapping, TransitionGraphSummary, TransitionRecords } from '../types';
import { buildGraphSummary } from './graph-summary';
import { extractTransitions } from './transition-analyzer';

const logger = createLogger('session-analyzer');

export interface SessionTransitionOptions {
  /** Only transitions between these codes are included */
  states?: readonly number[];
  /** Transitions shorter than or equal to this many seconds are dropped */
  minDuration?: number;
}

export interface BurrowLengthSample {
  /** Seconds since the start of the recording */
  time: number;
  /** Centimeters */
  length: number;
}

/**
 * Analyzes the results of one tracked recording
 */
export class SessionAnalyzer {
  /** Seconds per frame */
  readonly timeScale: number;
  /** Centimeters per pixel */
  readonly lengthScale: number;
  readonly mouseTrack: MouseTrack | null;
  private readonly session: SessionData;

  constructor(session: SessionData) {
    const parsed = sessionDataSchema.safeParse(session);
    if (!parsed.success) {
      throw ValidationError.fromZod('session data', parsed.error);
    }

    this.session = parsed.data;
    this.timeScale = 1 / this.session.fps;
    this.lengthScale = this.session.pixelSizeCm;
    this.mouseTrack = this.session.mouseTrajectory
      ? MouseTrack.fromRows(this.session.mouseTrajectory)
      : null;

    logger.debug(
      {
        fps: this.session.fps,
        frames: this.mouseTrack?.frameCount ?? null,
        burrowTracks: this.session.burrowTracks?.length ?? 0
      },
      'Session loaded'
    );
  }

  /**
   * Durations [seconds] the mouse spends in each state before transitioning
   */
  getMouseStateTransitions(options: SessionTransitionOptions = {}): TransitionRecords {
    if (!this.mouseTrack) {
      throw new PrecursorMissingError(
        'The mouse trajectory has to be determined before the transitions can be analyzed.'
      );
    }

    return extractTransitions(this.mouseTrack.states, {
      timeScale: this.timeScale,
      allowedCodes: options.states ? [...options.states] : undefined,
      minDuration: options.minDuration
    });
  }

  /**
   * Graph of the transitions between the categories of mouse states
   */
  getMouseTransitionGraph(
    options: SessionTransitionOptions = {},
    categories: StateCategoryMapping = DEFAULT_STATE_CATEGORIES
  ): TransitionGraphSummary {
    return buildGraphSummary(this.getMouseStateTransitions(options), categories);
  }

  /**
   * Length of every burrow over time
   */
  getBurrowLengths(): BurrowLengthSample[][] {
    return (this.session.burrowTracks ?? []).map(track =>
      track.times.map((frame, index) => ({
        time: frame * this.timeScale,
        length: track.lengths[index] * this.lengthScale
      }))
    );
  }
}
