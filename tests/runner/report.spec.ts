import { describe, it, expect } from 'vitest';
import { formatFinding, formatOutcome, formatSummary } from '../../src/runner/report.js';
import { ResultRecorder } from '../../src/checks/result.js';
import { DiagnosticError, RUNNABLE, type Check } from '../../src/checks/types.js';

const check: Check = {
  name: 'Example',
  description: 'example check',
  canRun: async () => RUNNABLE,
  inspect: async () => new ResultRecorder('Example').seal(),
};

describe('formatFinding', () => {
  it('prints the level, code and indented message', () => {
    const r = new ResultRecorder('Example');
    r.errort('EX0001', null, '\nPod {{podName}} is broken.\nReason: {{reason}}', { podName: 'router-1', reason: 'EOF' });

    expect(formatFinding(r.findings[0])).toEqual([
      '[Error] EX0001',
      '    Pod router-1 is broken.',
      '    Reason: EOF',
    ]);
  });
});

describe('formatOutcome', () => {
  it('hides findings below the chosen level', () => {
    const r = new ResultRecorder('Example');
    r.debug('EX0001', null, 'noise');
    r.warn('EX0002', null, 'heads up');

    expect(formatOutcome({ status: 'ran', check, result: r.seal(), durationMs: 12 }, 'info')).toEqual([
      '  ✓ Example (12ms)',
      '    [Warning] EX0002',
      '        heads up',
    ]);
  });

  it('marks failed checks', () => {
    const r = new ResultRecorder('Example');
    r.error('EX0003', null, 'broken');

    expect(formatOutcome({ status: 'ran', check, result: r.seal(), durationMs: 3 }, 'error')[0]).toBe('  ✗ Example (3ms)');
  });

  it('shows why a check was skipped', () => {
    const reason = new DiagnosticError('noConfig', 'must have node config file');
    expect(formatOutcome({ status: 'skipped', check, reason }, 'info')).toEqual([
      '  - Example: skipped (must have node config file)',
    ]);
  });
});

describe('formatSummary', () => {
  it('counts each outcome', () => {
    expect(formatSummary({ passed: 2, failed: 1, skipped: 3, outcomes: [] })).toBe('2 passed, 1 failed, 3 skipped');
  });
});
