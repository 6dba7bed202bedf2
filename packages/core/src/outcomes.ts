import type { Ecosystem, RequirementId } from './index';

export const outcomes = ['Passed', 'Skipped', 'Unknown', 'Failed'] as const;
export type Outcome = (typeof outcomes)[number];

/**
 * Why an outcome is Unknown. A mapped test with no matching result is not the
 * same finding as a result whose outcome could not be read.
 */
export type UnknownReason = 'result-missing' | 'outcome-unrecognized';

export interface ResultRecord {
  name: string;
  outcome: Outcome;
  rawOutcome?: string;
  /** Requirement-like labels carried by the result artifact itself. */
  categories: string[];
}

export interface CoverageEntry {
  requirementId: RequirementId;
  ecosystem: Ecosystem;
  testName: string;
  outcome: Outcome;
  reason?: UnknownReason;
}

// Passed is best, Failed is worst.
export const outcomeSeverity: Record<Outcome, number> = {
  Passed: 0,
  Skipped: 1,
  Unknown: 2,
  Failed: 3,
};

const outcomeAliases: Record<string, Outcome> = {
  passed: 'Passed',
  pass: 'Passed',
  success: 'Passed',
  ok: 'Passed',
  completed: 'Passed',
  failed: 'Failed',
  fail: 'Failed',
  failure: 'Failed',
  error: 'Failed',
  timeout: 'Failed',
  aborted: 'Failed',
  skipped: 'Skipped',
  skip: 'Skipped',
  ignored: 'Skipped',
  notexecuted: 'Skipped',
  notrunnable: 'Skipped',
};

export const normalizeOutcome = (raw: string | undefined | null): Outcome => {
  if (!raw) {
    return 'Unknown';
  }
  return outcomeAliases[raw.trim().toLowerCase()] ?? 'Unknown';
};

export const compareOutcomes = (left: Outcome, right: Outcome): number =>
  outcomeSeverity[left] - outcomeSeverity[right];

export const worstOutcome = (values: Iterable<Outcome>): Outcome => {
  let worst: Outcome | undefined;
  for (const value of values) {
    if (worst === undefined || compareOutcomes(value, worst) > 0) {
      worst = value;
    }
  }
  return worst ?? 'Unknown';
};
