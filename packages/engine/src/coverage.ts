import {
  DEFAULT_REQUIREMENT_PREFIX,
  addRequirements,
  ecosystemLabels,
  normalizeRequirementId,
  worstOutcome,
  type CoverageEntry,
  type Ecosystem,
  type Outcome,
  type RequirementId,
  type ResultRecord,
  type TestRequirementMap,
} from '@reqtrace/core';

import { createOutcomeIndex, resolveOutcome } from './outcomeIndex';

/** `Plant.Tests.PressureTests.Shutdown(1)` and `tests/test_x.py::test_a` to their method names. */
export const shortTestName = (name: string): string => {
  const withoutParameters = name.split(/[([]/u, 1)[0].trim();
  const segments = withoutParameters.split(/::|\./u);
  return segments[segments.length - 1];
};

/**
 * Requirement identifiers carried by the result artifacts themselves (TRX
 * categories, JUnit requirement properties), keyed by short test name so they
 * join like scanned associations.
 */
export const deriveResultAssociations = (
  results: Iterable<ResultRecord>,
  prefix: string = DEFAULT_REQUIREMENT_PREFIX,
): TestRequirementMap => {
  const map: TestRequirementMap = new Map();
  for (const record of results) {
    const ids = record.categories
      .map((category) => normalizeRequirementId(category, prefix))
      .filter((id): id is RequirementId => id !== undefined);
    addRequirements(map, shortTestName(record.name), ids);
  }
  return map;
};

type EntryKey = Pick<CoverageEntry, 'ecosystem' | 'testName'>;

/** Orders by ecosystem label, then test name. */
export const compareEntries = (left: EntryKey, right: EntryKey): number =>
  ecosystemLabels[left.ecosystem].localeCompare(ecosystemLabels[right.ecosystem]) ||
  left.testName.localeCompare(right.testName);

/** One entry per (mapped test, requirement) pair, each carrying the resolved outcome. */
export const joinCoverage = (
  ecosystem: Ecosystem,
  results: Iterable<ResultRecord>,
  map: TestRequirementMap,
): CoverageEntry[] => {
  const index = createOutcomeIndex(results);
  return Array.from(map.entries()).flatMap(([testName, requirementIds]) => {
    const { outcome, reason } = resolveOutcome(testName, index);
    return Array.from(requirementIds, (requirementId) => ({
      requirementId,
      ecosystem,
      testName,
      outcome,
      ...(reason ? { reason } : {}),
    }));
  });
};

/** Worst outcome among a requirement's entries; a requirement with none is Unknown. */
export const aggregateStatus = (entries: Iterable<Pick<CoverageEntry, 'outcome'>>): Outcome =>
  worstOutcome(Array.from(entries, (entry) => entry.outcome));
