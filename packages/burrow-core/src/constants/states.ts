/**
 * Location state encoding
 *
 * The location is encoded in the last two digits of a state code:
 *
 *   0      = location is unknown
 *   10..19 = overground
 *       11 = in the air
 *       12 = on either hill
 *       13 = in the valley
 *   20..29 = underground
 *       21 = in any burrow
 */
export const VALID_STATE_CODES = [0, 10, 11, 12, 13, 20, 21] as const;

export type StateCode = (typeof VALID_STATE_CODES)[number];

export const UNKNOWN_STATE_CODE: StateCode = 0;

/**
 * Overground locations, in code order (air = 11, hill = 12, valley = 13)
 */
export const OVERGROUND_LOCATIONS = ['air', 'hill', 'valley'] as const;

export type OvergroundLocation = (typeof OVERGROUND_LOCATIONS)[number];

/**
 * Underground locations, in code order (burrow = 21)
 */
export const UNDERGROUND_LOCATIONS = ['burrow'] as const;

export type UndergroundLocation = (typeof UNDERGROUND_LOCATIONS)[number];

export const OVERGROUND_BASE = 10;
export const UNDERGROUND_BASE = 20;

/**
 * Category predicates accepted by queryCategory
 */
export const STATE_QUERIES = [
  'underground',
  'in_air',
  'on_hill',
  'in_valley',
  'in_burrow'
] as const;

export type StateQuery = (typeof STATE_QUERIES)[number];

/**
 * Default code -> category labels used for the transition graph
 */
export const DEFAULT_STATE_CATEGORIES: Readonly<Record<StateCode, string>> = {
  0: 'unknown',
  10: 'sand',
  11: 'air',
  12: 'hill',
  13: 'valley',
  20: 'dimple',
  21: 'burrow'
};
