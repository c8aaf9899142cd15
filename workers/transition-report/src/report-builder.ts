import { formatDuration, formatISO, intervalToDuration } from 'date-fns';
import {
  DEFAULT_STATE_CATEGORIES,
  SessionAnalyzer,
  type SessionData,
  type StateCategoryMapping,
  type TransitionGraphEdge
} from '@burrow/core';

export interface TransitionReportOptions {
  minDuration?: number;
  allowedStates?: number[];
  categories?: StateCategoryMapping;
  now?: Date;
}

export interface TransitionReportNode {
  category: string;
  duration: number;
  dwell: string;
}

export interface TransitionReport {
  generatedAt: string;
  fps: number;
  timeScale: number;
  lengthScale: number;
  frameCount: number;
  nodes: TransitionReportNode[];
  edges: TransitionGraphEdge[];
  burrowCount: number;
}

/**
 * Human-readable dwell time, whole seconds
 */
export function formatDwell(seconds: number): string {
  const text = formatDuration(intervalToDuration({ start: 0, end: Math.floor(seconds) * 1000 }));
  return text || '0 seconds';
}

/**
 * Summarize the state transitions of a session for export
 */
export function buildTransitionReport(
  session: SessionData,
  options: TransitionReportOptions = {}
): TransitionReport {
  const analyzer = new SessionAnalyzer(session);
  const graph = analyzer.getMouseTransitionGraph(
    { states: options.allowedStates, minDuration: options.minDuration },
    options.categories ?? DEFAULT_STATE_CATEGORIES
  );

  return {
    generatedAt: formatISO(options.now ?? new Date()),
    fps: session.fps,
    timeScale: analyzer.timeScale,
    lengthScale: analyzer.lengthScale,
    frameCount: analyzer.mouseTrack?.frameCount ?? 0,
    nodes: graph.nodes.map(node => ({ ...node, dwell: formatDwell(node.duration) })),
    edges: [...graph.edges],
    burrowCount: analyzer.getBurrowLengths().length
  };
}
