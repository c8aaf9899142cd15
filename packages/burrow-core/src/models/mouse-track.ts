import { MOUSE_TRACK_COLUMNS } from '../constants/limits';
import { UNKNOWN_STATE_CODE } from '../constants/states';
import { encodeState, queryCategory } from '../codec/state-codec';
import { ValidationError } from '../errors';
import type { MouseTrackRow } from '../schemas/session.schema';
import type { LocationStateInput } from '../types';

export type Position = readonly [x: number, y: number];

/**
 * Mouse trajectory with the location state of every frame
 */
export class MouseTrack {
  static readonly columnNames = MOUSE_TRACK_COLUMNS;

  readonly positions: Position[];
  readonly states: number[];

  constructor(positions: Position[], states?: number[]) {
    if (states && states.length !== positions.length) {
      throw new ValidationError('Mouse track needs one state per position', {
        positions: positions.length,
        states: states.length
      });
    }

    this.positions = positions;
    this.states = states ?? new Array<number>(positions.length).fill(UNKNOWN_STATE_CODE);
  }

  /**
   * Build a track from `[x, y, status]` rows
   */
  static fromRows(rows: readonly MouseTrackRow[]): MouseTrack {
    return new MouseTrack(
      rows.map(([x, y]) => [x, y] as const),
      rows.map(([, , status]) => status)
    );
  }

  get frameCount(): number {
    return this.positions.length;
  }

  /**
   * Encode a location state and store it for one frame
   */
  setState(frameId: number, state: LocationStateInput): void {
    if (!Number.isInteger(frameId) || frameId < 0 || frameId >= this.frameCount) {
      throw new ValidationError(`Frame ${frameId} is outside the track`, {
        frameId,
        frameCount: this.frameCount
      });
    }

    this.states[frameId] = encodeState(state);
  }

  queryState(query: string): boolean[] {
    return queryCategory(this.states, query);
  }

  toRows(): MouseTrackRow[] {
    return this.positions.map(([x, y], frame): MouseTrackRow => [x, y, this.states[frame]]);
  }

  toString(): string {
    return `MouseTrack(frames=${this.frameCount})`;
  }
}
