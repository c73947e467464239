import { describe, expect, it } from 'vitest';
import { ContextWriteError } from '@/services/errors';
import { TripContext } from '@/services/trip-context';
import { failedAgentResult } from '@/services/vertical/base-agent';

describe('TripContext', () => {
  it('holds one result per category', () => {
    const context = new TripContext();
    const result = failedAgentResult('dining', 'no data', 3);
    context.record(result);

    expect(context.has('dining')).toBe(true);
    expect(context.get('dining')).toBe(result);
    expect(context.get('lodging')).toBeUndefined();
    expect(() => context.record(failedAgentResult('dining', 'again', 1))).toThrow(ContextWriteError);
  });

  it('hands out frozen snapshots that later writes do not change', () => {
    const context = new TripContext();
    const before = context.snapshot();
    context.record(failedAgentResult('budget', 'no data', 1));

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.budget).toBeUndefined();
    expect(context.snapshot().budget?.status).toBe('failed');
  });

  it('starts from the kept results of an earlier run', () => {
    const dining = failedAgentResult('dining', 'no data', 3);
    const lodging = failedAgentResult('lodging', 'no data', 2);
    const context = TripContext.seeded({ dining, lodging }, ['dining', 'transport']);

    expect(context.get('dining')).toBe(dining);
    expect(context.has('lodging')).toBe(false);
    expect(context.has('transport')).toBe(false);
    context.record(failedAgentResult('lodging', 'again', 1));
    expect(context.get('lodging')?.status).toBe('failed');
  });
});

describe('failedAgentResult', () => {
  it('carries the cause as a warning with zero confidence', () => {
    expect(failedAgentResult('transport', 'timed out', 12)).toEqual({
      category: 'transport',
      status: 'failed',
      payload: null,
      provenance: null,
      confidence: 0,
      caveats: [],
      warnings: [{ severity: 'warning', message: 'transport agent failed: timed out' }],
      durationMs: 12,
      error: 'timed out',
    });
  });
});
