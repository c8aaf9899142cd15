import { PrecursorMissingError, ValidationError } from '../errors';
import { createLogger } from '../logger';
import {
  transitionOptionsSchema,
  type ResolvedTransitionOptions,
  type TransitionOptions
} from '../schemas/transitions.schema';
import type { StateSequence, TransitionRecords } from '../types';

const logger = createLogger('transition-analyzer');

/**
 * Key of a (from, to) pair in a TransitionRecords map
 */
export function transitionKey(from: number, to: number): string {
  return `${from}->${to}`;
}

/**
 * Collect the durations spent in each state before transitioning to another state
 *
 * Change points are the frames k with states[k] !== states[k + 1]. The duration
 * recorded at a change point is the number of frames since the previous change
 * point times `timeScale`; the first dwell counts from the frame before the
 * sequence. The trailing dwell never produces a transition.
 *
 * A transition is recorded only when both codes are in `allowedCodes` (all
 * codes when omitted) and the duration is strictly greater than `minDuration`.
 *
 * @throws PrecursorMissingError when no state sequence has been computed
 */
export function extractTransitions(
  states: StateSequence | null | undefined,
  options: TransitionOptions
): TransitionRecords {
  if (states == null) {
    throw new PrecursorMissingError(
      'The state sequence has to be determined before the transitions can be analyzed.'
    );
  }

  const parsed = transitionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw ValidationError.fromZod('transition options', parsed.error);
  }

  const { timeScale, minDuration, allowedCodes }: ResolvedTransitionOptions = parsed.data;
  const allowed = allowedCodes ? new Set(allowedCodes) : null;

  const transitions: TransitionRecords = new Map();
  let lastChange = -1;
  let changePoints = 0;

  for (let k = 0; k < states.length - 1; k++) {
    const from = states[k];
    const to = states[k + 1];
    if (from === to) continue;

    changePoints++;
    const duration = (k - lastChange) * timeScale;
    lastChange = k;

    if (allowed && !(allowed.has(from) && allowed.has(to))) continue;
    if (!(duration > minDuration)) continue;

    const key = transitionKey(from, to);
    const record = transitions.get(key);
    if (record) {
      record.durations.push(duration);
    } else {
      transitions.set(key, { from, to, durations: [duration] });
    }
  }

  logger.debug(
    { frames: states.length, changePoints, pairs: transitions.size },
    'Extracted state transitions'
  );

  return transitions;
}
