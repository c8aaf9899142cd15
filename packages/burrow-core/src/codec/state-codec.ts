import {
  OVERGROUND_BASE,
  OVERGROUND_LOCATIONS,
  UNDERGROUND_BASE,
  UNDERGROUND_LOCATIONS,
  UNKNOWN_STATE_CODE,
  VALID_STATE_CODES,
  type OvergroundLocation,
  type StateCode,
  type StateQuery,
  type UndergroundLocation
} from '../constants/states';
import { InvalidStateError, UnknownQueryError } from '../errors';
import { stateQuerySchema } from '../schemas/state.schema';
import type { LocationState, LocationStateInput, StateSequence } from '../types';

/**
 * Valid (underground, location) combinations
 */
type MatchedState =
  | { kind: 'unknown' }
  | { kind: 'overground'; location?: OvergroundLocation }
  | { kind: 'underground'; location?: UndergroundLocation };

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some(candidate => candidate === value);
}

/**
 * Location at a 1-based offset from the base code
 */
function locationAt<T extends string>(values: readonly T[], offset: number): T | undefined {
  return offset >= 1 && offset <= values.length ? values[offset - 1] : undefined;
}

/**
 * Match the input against the valid combinations.
 * Fields that do not take part in the match are returned as leftovers.
 */
function matchLocationState(input: LocationStateInput): {
  matched: MatchedState;
  leftover: Set<string>;
} {
  const leftover = new Set(Object.keys(input).filter(field => input[field] !== undefined));
  const { underground, location } = input;

  if (underground === false) {
    leftover.delete('underground');
    if (isOneOf(OVERGROUND_LOCATIONS, location)) {
      leftover.delete('location');
      return { matched: { kind: 'overground', location }, leftover };
    }
    return { matched: { kind: 'overground' }, leftover };
  }

  if (underground === true) {
    leftover.delete('underground');
    if (isOneOf(UNDERGROUND_LOCATIONS, location)) {
      leftover.delete('location');
      return { matched: { kind: 'underground', location }, leftover };
    }
    return { matched: { kind: 'underground' }, leftover };
  }

  // null is an explicit "unknown"; anything else non-boolean stays unaccounted for
  if (underground === null) {
    leftover.delete('underground');
  }
  return { matched: { kind: 'unknown' }, leftover };
}

function codeOf(matched: MatchedState): StateCode {
  switch (matched.kind) {
    case 'unknown':
      return UNKNOWN_STATE_CODE;
    case 'overground':
      return matched.location === undefined
        ? codeAt(OVERGROUND_BASE)
        : codeAt(OVERGROUND_BASE + OVERGROUND_LOCATIONS.indexOf(matched.location) + 1);
    case 'underground':
      return matched.location === undefined
        ? codeAt(UNDERGROUND_BASE)
        : codeAt(UNDERGROUND_BASE + UNDERGROUND_LOCATIONS.indexOf(matched.location) + 1);
    default: {
      const unreachable: never = matched;
      return unreachable;
    }
  }
}

function codeAt(value: number): StateCode {
  const code = VALID_STATE_CODES.find(candidate => candidate === value);
  if (code === undefined) {
    throw new RangeError(`State code table is missing ${value}`);
  }
  return code;
}

/**
 * Calculate the integer representing a location state
 *
 * @throws InvalidStateError when any field of the state cannot be interpreted
 */
export function encodeState(state: LocationStateInput): StateCode {
  const { matched, leftover } = matchLocationState(state);

  if (leftover.size > 0) {
    throw new InvalidStateError([...leftover], { state });
  }

  return codeOf(matched);
}

/**
 * Reconstruct the location state from an integer.
 * Never throws: unrecognized codes decode to the empty (unknown) state.
 */
export function decodeState(code: number): LocationState {
  if (!Number.isInteger(code)) {
    return {};
  }

  if (code >= OVERGROUND_BASE && code < OVERGROUND_BASE + 10) {
    const location = locationAt(OVERGROUND_LOCATIONS, code - OVERGROUND_BASE);
    return location === undefined ? { underground: false } : { underground: false, location };
  }

  if (code >= UNDERGROUND_BASE && code < UNDERGROUND_BASE + 10) {
    const location = locationAt(UNDERGROUND_LOCATIONS, code - UNDERGROUND_BASE);
    return location === undefined ? { underground: true } : { underground: true, location };
  }

  return {};
}

/**
 * Is the value one of the codes the encoder can produce?
 */
export function isValidStateCode(code: number): code is StateCode {
  return VALID_STATE_CODES.some(candidate => candidate === code);
}

// NOTE: `underground` matches codes 10..19 (tracked and above ground).
// A second definition for 20..29 under the same name was never reachable
// and is not provided.
const QUERY_PREDICATES: Record<StateQuery, (code: number) => boolean> = {
  underground: code => code >= OVERGROUND_BASE && code < OVERGROUND_BASE + 10,
  in_air: code => code === 11,
  on_hill: code => code === 12,
  in_valley: code => code === 13,
  in_burrow: code => code === 21
};

/**
 * Evaluate a category predicate for every frame of a state sequence
 *
 * @throws UnknownQueryError when the category is not recognized
 */
export function queryCategory(codes: StateSequence, category: string): boolean[] {
  const parsed = stateQuerySchema.safeParse(category);
  if (!parsed.success) {
    throw new UnknownQueryError(category);
  }

  const predicate = QUERY_PREDICATES[parsed.data];
  return codes.map(code => predicate(code));
}
