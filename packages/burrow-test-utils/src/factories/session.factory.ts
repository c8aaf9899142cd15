import { faker } from '@faker-js/faker';
import type { BurrowTrack, MouseTrackRow, SessionData } from '@burrow/core';

export interface SessionFactoryOptions {
  fps?: number;
  pixelSizeCm?: number;
  states?: number[] | null;
  burrowTracks?: BurrowTrack[];
}

/**
 * Mouse track rows at random positions for the given states
 */
export function createMouseTrackRows(states: number[]): MouseTrackRow[] {
  return states.map((status): MouseTrackRow => [
    faker.number.float({ min: 0, max: 1024, fractionDigits: 1 }),
    faker.number.float({ min: 0, max: 768, fractionDigits: 1 }),
    status
  ]);
}

export function createBurrowTrack(samples: number = 5): BurrowTrack {
  const times = Array.from({ length: samples }, (_, i) => i * 100);
  let length = 0;
  const lengths = times.map(() => {
    length += faker.number.int({ min: 0, max: 20 });
    return length;
  });
  return { times, lengths };
}

/**
 * Session data; pass `states: null` for a session without a mouse trajectory
 */
export function createSession(options: SessionFactoryOptions = {}): SessionData {
  const states = options.states === undefined ? [0, 10, 10, 11, 21, 21] : options.states;

  return {
    fps: options.fps ?? faker.helpers.arrayElement([20, 25, 30]),
    pixelSizeCm: options.pixelSizeCm ?? faker.number.float({ min: 0.05, max: 0.5, fractionDigits: 3 }),
    mouseTrajectory: states === null ? undefined : createMouseTrackRows(states),
    burrowTracks: options.burrowTracks ?? []
  };
}
