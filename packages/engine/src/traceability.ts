import {
  DEFAULT_REQUIREMENT_PREFIX,
  compareRequirementIds,
  mergeRequirementMaps,
  type CoverageEntry,
  type Ecosystem,
  type Outcome,
  type RequirementId,
  type ResultRecord,
  type TestRequirementMap,
  type UnknownReason,
} from '@reqtrace/core';

import { aggregateStatus, compareEntries, deriveResultAssociations, joinCoverage } from './coverage';

export interface EcosystemInput {
  ecosystem: Ecosystem;
  results: ResultRecord[];
  /** Associations found by scanning test sources. */
  map: TestRequirementMap;
}

export interface TraceabilityInput {
  catalogIds?: RequirementId[];
  ecosystems: EcosystemInput[];
  prefix?: string;
}

export interface RequirementTrace {
  id: RequirementId;
  status: Outcome;
  covered: boolean;
  /** Set when a covered requirement is Unknown. */
  reason?: UnknownReason;
  entries: CoverageEntry[];
}

export interface UnresolvedTest {
  ecosystem: Ecosystem;
  testName: string;
  requirementIds: RequirementId[];
}

export type SummaryMetric = 'covered' | 'passed' | 'failed' | 'skipped' | 'unknown';

export interface TraceabilitySummary {
  total: number;
  covered: number;
  uncovered: number;
  passed: number;
  failed: number;
  skipped: number;
  unknown: number;
  unresolvedTests: number;
  /** Whole-number percentages of the full requirement universe. */
  percentages: Record<SummaryMetric, number>;
}

export interface TraceabilityReport {
  requirements: RequirementTrace[];
  summary: TraceabilitySummary;
  unresolvedTests: UnresolvedTest[];
}

export const percentOf = (count: number, total: number): number =>
  total === 0 ? 0 : Math.round((count / total) * 100);

const unknownReason = (entries: CoverageEntry[]): UnknownReason | undefined => {
  const reasons = new Set(entries.flatMap((entry) => (entry.reason ? [entry.reason] : [])));
  if (reasons.size === 0) {
    return undefined;
  }
  return reasons.has('outcome-unrecognized') ? 'outcome-unrecognized' : 'result-missing';
};

const toTrace = (id: RequirementId, entries: CoverageEntry[]): RequirementTrace => {
  const status = aggregateStatus(entries);
  const sorted = [...entries].sort(compareEntries);
  const reason = status === 'Unknown' ? unknownReason(entries) : undefined;
  return { id, status, covered: entries.length > 0, ...(reason ? { reason } : {}), entries: sorted };
};

const collectUnresolved = (entries: CoverageEntry[]): UnresolvedTest[] => {
  const grouped = new Map<string, UnresolvedTest>();
  entries
    .filter((entry) => entry.reason === 'result-missing')
    .forEach((entry) => {
      const key = `${entry.ecosystem}\u0000${entry.testName}`;
      const current = grouped.get(key) ?? { ecosystem: entry.ecosystem, testName: entry.testName, requirementIds: [] };
      current.requirementIds = Array.from(new Set([...current.requirementIds, entry.requirementId])).sort(
        compareRequirementIds,
      );
      grouped.set(key, current);
    });
  return Array.from(grouped.values()).sort(compareEntries);
};

export const summarize = (requirements: RequirementTrace[], unresolvedTests: number): TraceabilitySummary => {
  const total = requirements.length;
  const count = (predicate: (trace: RequirementTrace) => boolean) => requirements.filter(predicate).length;
  const covered = count((trace) => trace.covered);
  const passed = count((trace) => trace.status === 'Passed');
  const failed = count((trace) => trace.status === 'Failed');
  const skipped = count((trace) => trace.status === 'Skipped');
  const unknown = count((trace) => trace.status === 'Unknown');
  return {
    total,
    covered,
    uncovered: total - covered,
    passed,
    failed,
    skipped,
    unknown,
    unresolvedTests,
    percentages: {
      covered: percentOf(covered, total),
      passed: percentOf(passed, total),
      failed: percentOf(failed, total),
      skipped: percentOf(skipped, total),
      unknown: percentOf(unknown, total),
    },
  };
};

/**
 * Joins every ecosystem's results to its associations and rolls them up per
 * requirement. The requirement universe is the catalog plus every identifier
 * any test or result mentions.
 */
export const buildTraceability = (input: TraceabilityInput): TraceabilityReport => {
  const prefix = input.prefix ?? DEFAULT_REQUIREMENT_PREFIX;
  const entries = input.ecosystems.flatMap(({ ecosystem, results, map }) =>
    joinCoverage(ecosystem, results, mergeRequirementMaps(map, deriveResultAssociations(results, prefix))),
  );

  const universe = new Set<RequirementId>(input.catalogIds ?? []);
  entries.forEach((entry) => universe.add(entry.requirementId));

  const byRequirement = new Map<RequirementId, CoverageEntry[]>();
  entries.forEach((entry) => {
    byRequirement.set(entry.requirementId, [...(byRequirement.get(entry.requirementId) ?? []), entry]);
  });

  const requirements = Array.from(universe)
    .sort(compareRequirementIds)
    .map((id) => toTrace(id, byRequirement.get(id) ?? []));
  const unresolvedTests = collectUnresolved(entries);

  return {
    requirements,
    summary: summarize(requirements, unresolvedTests.length),
    unresolvedTests,
  };
};
