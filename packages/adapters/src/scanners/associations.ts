import type { RequirementId, TestRequirementMap } from '@reqtrace/core';

import { heuristics, type Heuristic, type ScanResult } from '../types';

const rank = (heuristic: Heuristic): number => heuristics.indexOf(heuristic);

/**
 * Adds an association. An identifier already recorded by a more confident
 * heuristic keeps that heuristic; nothing is ever removed.
 */
export const recordAssociation = (
  result: ScanResult,
  testName: string,
  requirementId: RequirementId,
  heuristic: Heuristic,
): void => {
  const bucket = result.get(testName) ?? new Map<RequirementId, Heuristic>();
  const existing = bucket.get(requirementId);
  if (existing === undefined || rank(heuristic) < rank(existing)) {
    bucket.set(requirementId, heuristic);
  }
  result.set(testName, bucket);
};

export const recordAssociations = (
  result: ScanResult,
  testName: string,
  requirementIds: Iterable<RequirementId>,
  heuristic: Heuristic,
): void => {
  for (const id of requirementIds) {
    recordAssociation(result, testName, id, heuristic);
  }
};

export const mergeScanResults = (...results: ScanResult[]): ScanResult => {
  const merged: ScanResult = new Map();
  results.forEach((result) => {
    result.forEach((associations, testName) => {
      associations.forEach((heuristic, id) => recordAssociation(merged, testName, id, heuristic));
    });
  });
  return merged;
};

export const toRequirementMap = (result: ScanResult): TestRequirementMap => {
  const map: TestRequirementMap = new Map();
  result.forEach((associations, testName) => {
    if (associations.size > 0) {
      map.set(testName, new Set(associations.keys()));
    }
  });
  return map;
};

/** Plain-object view for logs and JSON output, sorted for stable diffs. */
export const describeScanResult = (result: ScanResult): Record<string, Record<RequirementId, Heuristic>> =>
  Object.fromEntries(
    Array.from(result.entries())
      .sort(([left], [right]) => left.localeCompare(right))
      .map(([testName, associations]) => [
        testName,
        Object.fromEntries(Array.from(associations.entries()).sort(([left], [right]) => left.localeCompare(right))),
      ]),
  );
