import type { OvergroundLocation, UndergroundLocation } from '../constants/states';

/**
 * Structured location of the tracked animal in one frame.
 * An absent `underground` means the location is unknown.
 */
export type LocationState =
  | { underground?: undefined; location?: undefined }
  | { underground: false; location?: OvergroundLocation }
  | { underground: true; location?: UndergroundLocation };

/**
 * Loosely typed state as it arrives from callers or storage.
 * Every field present must be accounted for by the encoder.
 */
export interface LocationStateInput {
  underground?: boolean | null;
  location?: string | null;
  [field: string]: unknown;
}

/**
 * Ordered per-frame state codes of one recording
 */
export type StateSequence = readonly number[];
