import { ecosystemLabels, type CoverageEntry, type Outcome, type UnknownReason } from '@reqtrace/core';
import type { RequirementTrace, TraceabilityReport, UnresolvedTest } from '@reqtrace/engine';

import { matrixTemplate, validationTemplate } from './templates';

export const PLACEHOLDER = '–';

export interface MatrixOptions {
  title?: string;
}

export interface ValidationReportOptions {
  title?: string;
}

const unknownLabels: Record<UnknownReason, string> = {
  'result-missing': 'Unknown (no result)',
  'outcome-unrecognized': 'Unknown (unrecognized outcome)',
};

/** Keeps a value inside one markdown table cell. */
export const escapeCell = (value: string): string => value.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');

export const formatOutcome = (outcome: Outcome, reason?: UnknownReason): string =>
  outcome === 'Unknown' && reason ? unknownLabels[reason] : outcome;

const describeEntry = (entry: CoverageEntry): string =>
  `${ecosystemLabels[entry.ecosystem]}:${entry.testName} (${formatOutcome(entry.outcome, entry.reason)})`;

const describeUnresolved = (test: UnresolvedTest): string => `${ecosystemLabels[test.ecosystem]}:${test.testName}`;

interface MatrixRow {
  requirement: string;
  ecosystem: string;
  test: string;
  outcome: string;
}

const placeholderRow = (requirement: string): MatrixRow => ({
  requirement,
  ecosystem: PLACEHOLDER,
  test: PLACEHOLDER,
  outcome: PLACEHOLDER,
});

const matrixRows = (requirements: RequirementTrace[]): MatrixRow[] => {
  if (requirements.length === 0) {
    return [placeholderRow(PLACEHOLDER)];
  }
  return requirements.flatMap((trace) =>
    trace.entries.length === 0
      ? [placeholderRow(trace.id)]
      : trace.entries.map((entry) => ({
          requirement: trace.id,
          ecosystem: ecosystemLabels[entry.ecosystem],
          test: escapeCell(entry.testName),
          outcome: formatOutcome(entry.outcome, entry.reason),
        })),
  );
};

/** One row per (requirement, ecosystem, test); uncovered requirements get a placeholder row. */
export const renderTraceabilityMatrix = (report: TraceabilityReport, options: MatrixOptions = {}): string =>
  matrixTemplate.render({
    title: options.title ?? 'Traceability Matrix',
    rows: matrixRows(report.requirements),
  });

export const renderValidationReport = (report: TraceabilityReport, options: ValidationReportOptions = {}): string => {
  const { requirements, summary, unresolvedTests } = report;
  return validationTemplate.render({
    title: options.title ?? 'Validation Report',
    summary,
    failing: requirements
      .filter((trace) => trace.status === 'Failed')
      .map((trace) => ({ id: trace.id, tests: trace.entries.map(describeEntry).join('; ') })),
    uncovered: requirements.filter((trace) => !trace.covered).map((trace) => trace.id),
    unresolved: unresolvedTests.map((test) => ({
      test: describeUnresolved(test),
      requirements: test.requirementIds.join(', '),
    })),
    rows: requirements.map((trace) => ({
      id: trace.id,
      status: formatOutcome(trace.status, trace.reason),
      tests: trace.entries.length === 0 ? PLACEHOLDER : escapeCell(trace.entries.map(describeEntry).join('<br/>')),
    })),
  });
};
