import { describe, it, expect } from 'vitest';
import { plan } from '../engine/redistribution/planner.js';
import {
  formatExecutionReport,
  formatPlan,
  formatSummary,
  formatTransfer,
} from '../engine/redistribution/report.js';
import type { ExecutionReport } from '../engine/redistribution/types.js';
import { states } from './setup.js';

describe('formatTransfer', () => {
  it('uses ids by default', () => {
    expect(formatTransfer({ sourceId: 2, destinationId: 1, quantity: 50 })).toBe('2 -> 1: 50');
  });

  it('uses labels where given and falls back to ids', () => {
    const labels = new Map([[2, 'South']]);
    expect(formatTransfer({ sourceId: 2, destinationId: 1, quantity: 50 }, labels)).toBe('South -> 1: 50');
  });
});

describe('formatSummary', () => {
  it('prints books moved and skips', () => {
    expect(formatSummary(12, 2)).toBe('Total books moved: 12, skipped transfers: 2');
  });
});

describe('formatPlan', () => {
  it('lists transfers and the summary', () => {
    const result = plan(states({ 1: [0, 100], 2: [100, 100] }));

    expect(formatPlan(result)).toBe('2 -> 1: 50\nTotal books moved: 50, skipped transfers: 0');
  });

  it('appends residual lines', () => {
    const result = plan(states({ 1: [10, 10], 2: [10, 10], 3: [0, 10] }));

    expect(formatPlan(result, { labels: new Map([[3, 'East']]) })).toBe(
      [
        '1 -> East: 3',
        '2 -> East: 3',
        'Total books moved: 6, skipped transfers: 0',
        'Residual deficit at East: 1',
      ].join('\n')
    );
  });

  it('truncates long listings but keeps the full total', () => {
    const result = plan(states({ 1: [10, 10], 2: [10, 10], 3: [0, 10] }));

    expect(formatPlan(result, { limit: 1 })).toBe(
      [
        '1 -> 3: 3',
        '... and 1 more transfers',
        'Total books moved: 6, skipped transfers: 0',
        'Residual deficit at 3: 1',
      ].join('\n')
    );
  });

  it('says so when nothing needs to move', () => {
    expect(formatPlan(plan(states({ 1: [5, 10] })))).toBe(
      'No transfers needed: libraries are already balanced.'
    );
  });

  it('still lists a residual surplus when nothing moves', () => {
    const result = plan(states({ 1: [1, 1], 2: [0, 1], 3: [0, 1], 4: [0, 1] }));

    expect(formatPlan(result)).toBe(
      'No transfers needed: libraries are already balanced.\nResidual surplus at 1: 1'
    );
  });
});

describe('formatExecutionReport', () => {
  const report: ExecutionReport = {
    mode: 'apply',
    entries: [
      { transfer: { sourceId: 1, destinationId: 3, quantity: 3 }, outcome: { status: 'applied' } },
      {
        transfer: { sourceId: 2, destinationId: 3, quantity: 3 },
        outcome: {
          status: 'skipped',
          reason: 'insufficient-capacity',
          detail: 'destination library 3 has room for 1 of 3 books',
        },
      },
    ],
    booksMoved: 3,
    appliedCount: 1,
    skippedCount: 1,
    aborted: false,
    pending: [],
  };

  it('marks each transfer with its outcome', () => {
    expect(formatExecutionReport(report)).toBe(
      [
        '1 -> 3: 3 [applied]',
        '2 -> 3: 3 [skipped: destination library 3 has room for 1 of 3 books]',
        'Total books moved: 3, skipped transfers: 1',
      ].join('\n')
    );
  });

  it('notes cancelled transfers', () => {
    const cancelled: ExecutionReport = {
      ...report,
      entries: report.entries.slice(0, 1),
      skippedCount: 0,
      aborted: true,
      pending: [{ sourceId: 2, destinationId: 3, quantity: 3 }],
    };

    expect(formatExecutionReport(cancelled)).toBe(
      [
        '1 -> 3: 3 [applied]',
        'Total books moved: 3, skipped transfers: 0',
        'Cancelled with 1 transfer(s) not attempted',
      ].join('\n')
    );
  });
});
