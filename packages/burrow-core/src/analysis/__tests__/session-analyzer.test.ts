import { describe, it, expect } from 'vitest';
import { createBurrowTrack, createSession, createStateSequence } from '@burrow/test-utils';
import { SessionAnalyzer } from '../session-analyzer';
import { PrecursorMissingError, ValidationError } from '../../errors';

describe('SessionAnalyzer', () => {
  it('should derive scales from the session', () => {
    const analyzer = new SessionAnalyzer(createSession({ fps: 25, pixelSizeCm: 0.2 }));

    expect(analyzer.timeScale).toBe(0.04);
    expect(analyzer.lengthScale).toBe(0.2);
  });

  it('should reject invalid session data', () => {
    expect(() => new SessionAnalyzer({ fps: -1, pixelSizeCm: 0.1 })).toThrow(ValidationError);
  });

  it('should report transitions in seconds', () => {
    const states = createStateSequence([
      { code: 12, frames: 4 },
      { code: 21, frames: 2 },
      { code: 12, frames: 1 }
    ]);
    const analyzer = new SessionAnalyzer(createSession({ fps: 2, states }));
    const transitions = analyzer.getMouseStateTransitions();

    expect(transitions.get('12->21')?.durations).toEqual([2]);
    expect(transitions.get('21->12')?.durations).toEqual([1]);
  });

  it('should filter transitions by state and minimum duration', () => {
    const states = createStateSequence([
      { code: 10, frames: 2 },
      { code: 11, frames: 6 },
      { code: 21, frames: 4 },
      { code: 11, frames: 1 }
    ]);
    const analyzer = new SessionAnalyzer(createSession({ fps: 2, states }));

    const byState = analyzer.getMouseStateTransitions({ states: [11, 21] });
    expect([...byState.keys()]).toEqual(['11->21', '21->11']);

    const byDuration = analyzer.getMouseStateTransitions({ minDuration: 2 });
    expect([...byDuration.keys()]).toEqual(['11->21']);
  });

  it('should require a mouse trajectory', () => {
    const analyzer = new SessionAnalyzer(createSession({ states: null }));

    expect(() => analyzer.getMouseStateTransitions()).toThrow(PrecursorMissingError);
    expect(() => analyzer.getMouseStateTransitions()).toThrow(
      'The mouse trajectory has to be determined before the transitions can be analyzed.'
    );
  });

  it('should treat an empty trajectory as having no transitions', () => {
    const analyzer = new SessionAnalyzer(createSession({ states: [] }));

    expect(analyzer.getMouseStateTransitions().size).toBe(0);
    expect(analyzer.getMouseTransitionGraph()).toEqual({ nodes: [], edges: [] });
  });

  it('should build the transition graph with the default categories', () => {
    const states = createStateSequence([
      { code: 12, frames: 4 },
      { code: 21, frames: 2 },
      { code: 12, frames: 1 }
    ]);
    const analyzer = new SessionAnalyzer(createSession({ fps: 2, states }));
    const graph = analyzer.getMouseTransitionGraph();

    expect(graph.nodes).toEqual([
      { category: 'hill', duration: 2 },
      { category: 'burrow', duration: 1 }
    ]);
    expect(graph.edges).toEqual([
      { from: 'hill', to: 'burrow', rate: 0.5, count: 1 },
      { from: 'burrow', to: 'hill', rate: 1, count: 1 }
    ]);
  });

  it('should accept a custom category mapping', () => {
    const states = [11, 11, 12, 12];
    const analyzer = new SessionAnalyzer(createSession({ fps: 1, states }));
    const graph = analyzer.getMouseTransitionGraph({}, { 11: 'up', 12: 'top' });

    expect(graph.edges).toEqual([{ from: 'up', to: 'top', rate: 0.5, count: 1 }]);
  });

  it('should scale burrow lengths to seconds and centimeters', () => {
    const analyzer = new SessionAnalyzer(
      createSession({
        fps: 10,
        pixelSizeCm: 0.5,
        burrowTracks: [{ times: [0, 20, 40], lengths: [0, 4, 10] }]
      })
    );

    expect(analyzer.getBurrowLengths()).toEqual([
      [
        { time: 0, length: 0 },
        { time: 2, length: 2 },
        { time: 4, length: 5 }
      ]
    ]);
  });

  it('should return one series per burrow track', () => {
    const analyzer = new SessionAnalyzer(
      createSession({ burrowTracks: [createBurrowTrack(3), createBurrowTrack(7)] })
    );

    expect(analyzer.getBurrowLengths().map(series => series.length)).toEqual([3, 7]);
  });
});
