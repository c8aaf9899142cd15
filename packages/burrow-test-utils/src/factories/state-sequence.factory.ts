import { faker } from '@faker-js/faker';
import { VALID_STATE_CODES, type StateCode } from '@burrow/core';

/**
 * One dwell: a state held for a number of consecutive frames
 */
export interface Dwell {
  code: number;
  frames: number;
}

/**
 * Expand dwells into a per-frame state sequence
 */
export function createStateSequence(dwells: Dwell[]): number[] {
  return dwells.flatMap(({ code, frames }) => new Array<number>(frames).fill(code));
}

export interface RandomDwellOptions {
  count?: number;
  codes?: readonly StateCode[];
  minFrames?: number;
  maxFrames?: number;
}

/**
 * Random dwells where consecutive dwells never share a code
 */
export function createRandomDwells(options: RandomDwellOptions = {}): Dwell[] {
  const count = options.count ?? faker.number.int({ min: 2, max: 20 });
  const codes = options.codes ?? VALID_STATE_CODES;
  const minFrames = options.minFrames ?? 1;
  const maxFrames = options.maxFrames ?? 50;

  const dwells: Dwell[] = [];
  for (let i = 0; i < count; i++) {
    const previous = dwells.length > 0 ? dwells[dwells.length - 1].code : null;
    const candidates = codes.filter(code => code !== previous);
    dwells.push({
      code: faker.helpers.arrayElement(candidates),
      frames: faker.number.int({ min: minFrames, max: maxFrames })
    });
  }
  return dwells;
}
