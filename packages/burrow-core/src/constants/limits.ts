/**
 * Analysis defaults and thresholds
 */

// Transitions
export const DEFAULT_MIN_DURATION = 0; // seconds, strict lower bound

// Mouse track rows
export const MOUSE_TRACK_COLUMNS = ['Position X', 'Position Y', 'Status'] as const;
