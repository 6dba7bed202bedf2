import type { Outcome, ResultRecord } from '@reqtrace/core';

import { aggregateStatus, deriveResultAssociations, joinCoverage, shortTestName } from './coverage';

const record = (name: string, outcome: ResultRecord['outcome'], categories: string[] = []): ResultRecord => ({
  name,
  outcome,
  categories,
});

describe('aggregateStatus', () => {
  const cases: Array<[Outcome[], Outcome]> = [
    [['Passed'], 'Passed'],
    [['Passed', 'Skipped'], 'Skipped'],
    [['Passed', 'Failed'], 'Failed'],
    [['Passed', 'Unknown'], 'Unknown'],
    [['Skipped', 'Unknown'], 'Unknown'],
    [['Unknown', 'Failed'], 'Failed'],
    [[], 'Unknown'],
  ];

  it.each(cases)('rolls %j up to %s', (outcomes, expected) => {
    expect(aggregateStatus(outcomes.map((outcome) => ({ outcome })))).toBe(expected);
  });
});

describe('shortTestName', () => {
  it('drops qualifiers and parameters', () => {
    expect(shortTestName('Plant.Tests.Pump.Start(1, 2.5)')).toBe('Start');
    expect(shortTestName('tests/test_pump.py::test_start[fast]')).toBe('test_start');
    expect(shortTestName('test_plain')).toBe('test_plain');
  });
});

describe('deriveResultAssociations', () => {
  it('keeps only categories that are requirement identifiers', () => {
    const map = deriveResultAssociations([
      record('Plant.Tests.Pump.Req_Start(1)', 'Passed', ['REQ-5', 'Smoke', 'req_007']),
      record('Plant.Tests.Pump.Untagged', 'Passed'),
    ]);

    expect(map).toEqual(new Map([['Req_Start', new Set(['REQ-005', 'REQ-007'])]]));
  });

  it('uses the configured prefix', () => {
    const map = deriveResultAssociations([record('Limits', 'Passed', ['SYS-001', 'REQ-001'])], 'SYS');
    expect(map).toEqual(new Map([['Limits', new Set(['SYS-001'])]]));
  });
});

describe('joinCoverage', () => {
  it('emits one entry per mapped test and requirement', () => {
    const entries = joinCoverage(
      'csharp',
      [record('Ns.Tests.Alpha', 'Passed')],
      new Map([
        ['Alpha', new Set(['REQ-001', 'REQ-002'])],
        ['Beta', new Set(['REQ-003'])],
      ]),
    );

    expect(entries).toEqual([
      { requirementId: 'REQ-001', ecosystem: 'csharp', testName: 'Alpha', outcome: 'Passed' },
      { requirementId: 'REQ-002', ecosystem: 'csharp', testName: 'Alpha', outcome: 'Passed' },
      { requirementId: 'REQ-003', ecosystem: 'csharp', testName: 'Beta', outcome: 'Unknown', reason: 'result-missing' },
    ]);
  });
});
