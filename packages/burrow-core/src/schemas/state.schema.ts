import { z } from 'zod';
import { STATE_QUERIES } from '../constants/states';

/**
 * State code - one integer per frame
 */
export const stateCodeSchema = z.number().int().describe('Per-frame location state code');

/**
 * Category predicate name accepted by queryCategory
 */
export const stateQuerySchema = z.enum(STATE_QUERIES).describe('Category predicate');
