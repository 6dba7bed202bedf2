import { worstOutcome, type Outcome, type ResultRecord, type UnknownReason } from '@reqtrace/core';

export interface ResolvedOutcome {
  outcome: Outcome;
  reason?: UnknownReason;
}

/** Result name to the worst outcome recorded under that name. */
export type OutcomeIndex = Map<string, ResolvedOutcome>;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Unknown only survives as the worst outcome when a record itself was unreadable.
const withReason = (outcome: Outcome): ResolvedOutcome =>
  outcome === 'Unknown' ? { outcome, reason: 'outcome-unrecognized' } : { outcome };

/**
 * The same test can appear in several artifacts or once per parameter set;
 * those records collapse to their worst outcome.
 */
export const createOutcomeIndex = (results: Iterable<ResultRecord>): OutcomeIndex => {
  const grouped = new Map<string, Outcome[]>();
  for (const record of results) {
    grouped.set(record.name, [...(grouped.get(record.name) ?? []), record.outcome]);
  }
  const index: OutcomeIndex = new Map();
  grouped.forEach((values, name) => index.set(name, withReason(worstOutcome(values))));
  return index;
};

const combine = (matches: ResolvedOutcome[]): ResolvedOutcome =>
  withReason(worstOutcome(matches.map((match) => match.outcome)));

/**
 * Looks a mapped test name up in the index: exact name, then a qualified name
 * ending in `.name` or `::name`, then a qualified name followed by `(`.
 * Several matches under one rule combine to their worst outcome.
 */
export const resolveOutcome = (testName: string, index: OutcomeIndex): ResolvedOutcome => {
  const exact = index.get(testName);
  if (exact) {
    return exact;
  }

  const entries = Array.from(index.entries());
  const suffixed = entries
    .filter(([name]) => name.endsWith(`.${testName}`) || name.endsWith(`::${testName}`))
    .map(([, resolved]) => resolved);
  if (suffixed.length > 0) {
    return combine(suffixed);
  }

  const call = new RegExp(`(?:^|[.:])${escapeRegExp(testName)}\\s*\\(`);
  const called = entries.filter(([name]) => call.test(name)).map(([, resolved]) => resolved);
  if (called.length > 0) {
    return combine(called);
  }

  return { outcome: 'Unknown', reason: 'result-missing' };
};
