import { promises as fs } from 'fs';
import path from 'path';

import YAML from 'yaml';

import {
  DEFAULT_LOCALE,
  TraceabilityError,
  compareRequirementIds,
  describeError,
  normalizeRequirementId,
  requirementCatalogSchema,
  type RequirementId,
} from '@reqtrace/core';

export interface LoadedCatalog {
  ids: RequirementId[];
  warnings: string[];
}

const catalogError = (
  code: 'CATALOG_UNREADABLE' | 'CATALOG_INVALID',
  catalogPath: string,
  reason: string,
  locale: string,
  details?: unknown,
): TraceabilityError => new TraceabilityError(code, { locale, messageParams: { path: catalogPath, reason }, details });

const parseDocument = (content: string, catalogPath: string, locale: string): unknown => {
  try {
    return path.extname(catalogPath).toLowerCase() === '.json' ? JSON.parse(content) : YAML.parse(content);
  } catch (error) {
    throw catalogError('CATALOG_INVALID', catalogPath, describeError(error), locale);
  }
};

/**
 * Reads a JSON or YAML catalog: either a list of `{ id }` records or an object
 * with a `requirements` list. Identifiers are normalized to the configured
 * prefix; entries that are not identifiers are reported and skipped.
 */
export const loadCatalog = async (
  catalogPath: string,
  prefix: string,
  locale: string = DEFAULT_LOCALE,
): Promise<LoadedCatalog> => {
  let content: string;
  try {
    content = await fs.readFile(catalogPath, 'utf8');
  } catch (error) {
    throw catalogError('CATALOG_UNREADABLE', catalogPath, describeError(error), locale);
  }

  const parsed = requirementCatalogSchema.safeParse(parseDocument(content, catalogPath, locale));
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw catalogError('CATALOG_INVALID', catalogPath, reason, locale, parsed.error.issues);
  }

  const ids = new Set<RequirementId>();
  const warnings: string[] = [];
  parsed.data.forEach((requirement) => {
    const id = normalizeRequirementId(requirement.id, prefix);
    if (id) {
      ids.add(id);
    } else {
      warnings.push(`Catalog entry "${requirement.id}" is not a ${prefix} identifier and was skipped.`);
    }
  });

  return { ids: Array.from(ids).sort(compareRequirementIds), warnings };
};
