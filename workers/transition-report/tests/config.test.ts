import { describe, it, expect } from 'vitest';
import { ValidationError } from '@burrow/core';
import { loadReportConfig } from '../src/config';

describe('loadReportConfig', () => {
  it('should apply defaults', () => {
    const config = loadReportConfig({ SESSION_FILE: 'session.json' });

    expect(config).toEqual({
      sessionFile: 'session.json',
      outputFile: undefined,
      minDuration: 0,
      allowedStates: undefined,
      logLevel: 'info'
    });
  });

  it('should parse thresholds and allowed states', () => {
    const config = loadReportConfig({
      SESSION_FILE: 'session.json',
      REPORT_OUTPUT_FILE: 'report.json',
      TRANSITION_MIN_DURATION: '1.5',
      TRANSITION_ALLOWED_STATES: '11, 12,21',
      LOG_LEVEL: 'debug'
    });

    expect(config).toEqual({
      sessionFile: 'session.json',
      outputFile: 'report.json',
      minDuration: 1.5,
      allowedStates: [11, 12, 21],
      logLevel: 'debug'
    });
  });

  it('should require a session file', () => {
    expect(() => loadReportConfig({})).toThrow(ValidationError);
  });

  it('should reject malformed state lists', () => {
    expect(() =>
      loadReportConfig({ SESSION_FILE: 'session.json', TRANSITION_ALLOWED_STATES: '11,air' })
    ).toThrow(ValidationError);
  });

  it('should reject negative thresholds', () => {
    expect(() =>
      loadReportConfig({ SESSION_FILE: 'session.json', TRANSITION_MIN_DURATION: '-1' })
    ).toThrow(ValidationError);
  });
});
