import type { ResultRecord } from '@reqtrace/core';

import { createOutcomeIndex, resolveOutcome } from './outcomeIndex';

const record = (name: string, outcome: ResultRecord['outcome']): ResultRecord => ({ name, outcome, categories: [] });

describe('createOutcomeIndex', () => {
  it('keeps the worst outcome for duplicated names', () => {
    const index = createOutcomeIndex([
      record('test_limits', 'Passed'),
      record('test_limits', 'Failed'),
      record('test_limits', 'Skipped'),
      record('test_other', 'Skipped'),
    ]);

    expect(index.get('test_limits')).toEqual({ outcome: 'Failed' });
    expect(index.get('test_other')).toEqual({ outcome: 'Skipped' });
  });

  it('marks Unknown records as unrecognized', () => {
    const index = createOutcomeIndex([record('Mystery', 'Unknown'), record('Mystery', 'Passed')]);
    expect(index.get('Mystery')).toEqual({ outcome: 'Unknown', reason: 'outcome-unrecognized' });
  });
});

describe('resolveOutcome', () => {
  const index = createOutcomeIndex([
    record('test_exact', 'Passed'),
    record('Plant.Tests.PressureTests.Shutdown', 'Failed'),
    record('tests/test_valves.py::test_opens', 'Skipped'),
    record('Plant.Tests.Limits.Check(1)', 'Passed'),
    record('Plant.Tests.Limits.Check(2)', 'Failed'),
    record('Plant.Tests.Other.Check', 'Passed'),
    record('Plant.Tests.Other.Check', 'Passed'),
    record('Plant.Tests.ShutdownDelay', 'Failed'),
  ]);

  it('prefers an exact match', () => {
    expect(resolveOutcome('test_exact', index)).toEqual({ outcome: 'Passed' });
  });

  it('matches dotted and pytest-style qualified names', () => {
    expect(resolveOutcome('Shutdown', index)).toEqual({ outcome: 'Failed' });
    expect(resolveOutcome('test_opens', index)).toEqual({ outcome: 'Skipped' });
  });

  it('stops at the first rule that matches', () => {
    expect(resolveOutcome('Check', index)).toEqual({ outcome: 'Passed' });
  });

  it('falls back to parameterised names and combines them by worst outcome', () => {
    const parameterised = createOutcomeIndex([
      record('Plant.Tests.Limits.Check(1)', 'Passed'),
      record('Plant.Tests.Limits.Check (2)', 'Failed'),
    ]);
    expect(resolveOutcome('Check', parameterised)).toEqual({ outcome: 'Failed' });
  });

  it('does not match a longer name sharing the prefix', () => {
    const other = createOutcomeIndex([record('Plant.Tests.ShutdownDelay', 'Failed')]);
    expect(resolveOutcome('Shutdown', other)).toEqual({ outcome: 'Unknown', reason: 'result-missing' });
  });

  it('reports a missing result distinctly', () => {
    expect(resolveOutcome('test_absent', index)).toEqual({ outcome: 'Unknown', reason: 'result-missing' });
  });
});
