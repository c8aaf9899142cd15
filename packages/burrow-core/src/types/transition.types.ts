/**
 * Observed dwell durations that ended in a specific (from, to) change
 */
export interface TransitionRecord {
  readonly from: number;
  readonly to: number;
  readonly durations: number[];
}

/**
 * Transition records keyed by `transitionKey(from, to)`, in order of first occurrence
 */
export type TransitionRecords = Map<string, TransitionRecord>;

/**
 * Caller-supplied mapping from state code to category label
 */
export type StateCategoryMapping = Readonly<Record<number, string>>;

export interface TransitionGraphNode {
  readonly category: string;
  /** Total dwell time spent in the category before leaving it */
  readonly duration: number;
}

export interface TransitionGraphEdge {
  readonly from: string;
  readonly to: string;
  /** Inverse of the mean dwell duration preceding this transition */
  readonly rate: number;
  readonly count: number;
}

export interface TransitionGraphSummary {
  readonly nodes: readonly TransitionGraphNode[];
  readonly edges: readonly TransitionGraphEdge[];
}
