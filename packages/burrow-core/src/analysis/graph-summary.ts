import { CategoryMappingError, DomainError } from '../errors';
import type {
  StateCategoryMapping,
  TransitionGraphEdge,
  TransitionGraphNode,
  TransitionGraphSummary,
  TransitionRecords
} from '../types';

function categoryOf(categories: StateCategoryMapping, code: number): string {
  const category = Object.prototype.hasOwnProperty.call(categories, code)
    ? categories[code]
    : undefined;
  if (category === undefined) {
    throw new CategoryMappingError(code);
  }
  return category;
}

function rateOf(durations: readonly number[], from: string, to: string): number {
  for (const duration of durations) {
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new DomainError(`Transition rate from ${from} to ${to} is undefined`, {
        from,
        to,
        duration
      });
    }
  }

  const mean = durations.reduce((sum, duration) => sum + duration, 0) / durations.length;
  return 1 / mean;
}

/**
 * Fold transition records into a category-level transition graph
 *
 * Node durations accrue to the category being left. Code pairs that map onto
 * the same category pair are merged before the rate is computed, so the rate
 * is the inverse mean of all their durations together.
 */
export function buildGraphSummary(
  transitions: TransitionRecords,
  categories: StateCategoryMapping
): TransitionGraphSummary {
  const nodeDurations = new Map<string, number>();
  const edgeDurations = new Map<string, { from: string; to: string; durations: number[] }>();

  for (const record of transitions.values()) {
    if (record.durations.length === 0) continue;

    const from = categoryOf(categories, record.from);
    const to = categoryOf(categories, record.to);

    const dwell = record.durations.reduce((sum, duration) => sum + duration, 0);
    nodeDurations.set(from, (nodeDurations.get(from) ?? 0) + dwell);
    if (!nodeDurations.has(to)) {
      nodeDurations.set(to, 0);
    }

    const key = JSON.stringify([from, to]);
    const edge = edgeDurations.get(key);
    if (edge) {
      edge.durations.push(...record.durations);
    } else {
      edgeDurations.set(key, { from, to, durations: [...record.durations] });
    }
  }

  const nodes: TransitionGraphNode[] = [...nodeDurations].map(([category, duration]) =>
    Object.freeze({ category, duration })
  );

  const edges: TransitionGraphEdge[] = [...edgeDurations.values()].map(({ from, to, durations }) =>
    Object.freeze({
      from,
      to,
      rate: rateOf(durations, from, to),
      count: durations.length
    })
  );

  return Object.freeze({ nodes: Object.freeze(nodes), edges: Object.freeze(edges) });
}
