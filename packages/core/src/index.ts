import { z, type ZodType } from 'zod';

export const DEFAULT_REQUIREMENT_PREFIX = 'REQ';

export type RequirementId = string;

export const ecosystems = ['csharp', 'python'] as const;
export type Ecosystem = (typeof ecosystems)[number];

export const ecosystemLabels: Record<Ecosystem, string> = {
  csharp: 'C#',
  python: 'Py',
};

/**
 * Requirement identifiers associated with each test name. Values are sets, so
 * associations from several heuristics or sources collapse naturally.
 */
export type TestRequirementMap = Map<string, Set<RequirementId>>;

export interface CatalogRequirement {
  id: string;
  [key: string]: unknown;
}

const catalogRecordSchema = z
  .object({
    id: z.string().trim().min(1, 'Requirement identifier is required.'),
  })
  .passthrough();

export const requirementCatalogSchema: ZodType<CatalogRequirement[], z.ZodTypeDef, unknown> = z.union([
  z.array(catalogRecordSchema),
  z
    .object({ requirements: z.array(catalogRecordSchema) })
    .transform((value) => value.requirements),
]);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const normalizePrefix = (prefix: string): string => prefix.trim().toUpperCase();

export const formatRequirementId = (
  digits: string | number,
  prefix: string = DEFAULT_REQUIREMENT_PREFIX,
): RequirementId => `${normalizePrefix(prefix)}-${String(Number(digits)).padStart(3, '0')}`;

/** Matches `REQ-001` tokens in free text. Always global, always case-insensitive. */
export const createRequirementPattern = (prefix: string = DEFAULT_REQUIREMENT_PREFIX): RegExp =>
  new RegExp(`\\b${escapeRegExp(normalizePrefix(prefix))}-(\\d{3})\\b`, 'gi');

/** `REQ` as `[rR][eE][qQ]`, so the rest of a pattern can stay case-sensitive. */
const caselessPattern = (value: string): string =>
  Array.from(value, (char) =>
    char.toLowerCase() === char.toUpperCase() ? escapeRegExp(char) : `[${char.toLowerCase()}${char.toUpperCase()}]`,
  ).join('');

/**
 * Matches identifiers embedded in a function or method name, where `-` is not
 * a legal character: `test_req_001_low`, `Req001Shutdown`, `test_REQ007`. The
 * prefix starts a word or a camel-case hump (`ValidatesReq001Trip`,
 * `TestREQ002`), never the middle of a lowercase word.
 */
export const createNameRequirementPattern = (prefix: string = DEFAULT_REQUIREMENT_PREFIX): RegExp => {
  const normalized = normalizePrefix(prefix);
  const start = `(?:(?<![A-Za-z])|(?<=[a-z])(?=[A-Z]))`;
  return new RegExp(`${start}${caselessPattern(normalized)}[-_]?(\\d{3})(?!\\d)`, 'g');
};

export const extractRequirementIds = (
  text: string,
  prefix: string = DEFAULT_REQUIREMENT_PREFIX,
): RequirementId[] => {
  const ids = Array.from(text.matchAll(createRequirementPattern(prefix)), (match) =>
    formatRequirementId(match[1], prefix),
  );
  return Array.from(new Set(ids));
};

export const extractRequirementIdsFromName = (
  name: string,
  prefix: string = DEFAULT_REQUIREMENT_PREFIX,
): RequirementId[] => {
  const ids = Array.from(name.matchAll(createNameRequirementPattern(prefix)), (match) =>
    formatRequirementId(match[1], prefix),
  );
  return Array.from(new Set(ids));
};

/**
 * Normalizes catalog spellings (`req-7`, `REQ_007`, `Req 007`) to `REQ-007`.
 * Returns undefined for anything that is not a requirement identifier.
 */
export const normalizeRequirementId = (
  value: string,
  prefix: string = DEFAULT_REQUIREMENT_PREFIX,
): RequirementId | undefined => {
  const pattern = new RegExp(`^${escapeRegExp(normalizePrefix(prefix))}[-_ ]?(\\d{1,3})$`, 'i');
  const match = value.trim().match(pattern);
  return match ? formatRequirementId(match[1], prefix) : undefined;
};

export const compareRequirementIds = (left: RequirementId, right: RequirementId): number =>
  left.localeCompare(right);

export const addRequirements = (
  map: TestRequirementMap,
  testName: string,
  requirementIds: Iterable<RequirementId>,
): void => {
  const bucket = map.get(testName) ?? new Set<RequirementId>();
  for (const id of requirementIds) {
    bucket.add(id);
  }
  if (bucket.size > 0) {
    map.set(testName, bucket);
  }
};

export const mergeRequirementMaps = (...maps: TestRequirementMap[]): TestRequirementMap => {
  const merged: TestRequirementMap = new Map();
  maps.forEach((map) => {
    map.forEach((ids, testName) => addRequirements(merged, testName, ids));
  });
  return merged;
};

export * from './outcomes';
export * from './errors';
export * from './i18n';
