import { promises as fs } from 'fs';

import { DEFAULT_REQUIREMENT_PREFIX, compareRequirementIds, extractRequirementIds, type RequirementId } from '@reqtrace/core';

import type { ParseResult } from './types';
import { discoverFiles } from './utils/discovery';
import { decodeText } from './utils/text';

export const SALVAGE_PATTERNS = ['**/*.cs', '**/*.py', '**/*.md', '**/*.yml', '**/*.yaml', '**/*.txt'];

export interface SalvageOptions {
  prefix?: string;
  exclude?: string[];
}

/**
 * Every requirement identifier mentioned anywhere in source, markdown, YAML or
 * text files under `root`. Used to seed the requirement list when nothing
 * else names one.
 */
export const salvageRequirementIds = async (
  root: string,
  options: SalvageOptions = {},
): Promise<ParseResult<RequirementId[]>> => {
  const prefix = options.prefix ?? DEFAULT_REQUIREMENT_PREFIX;
  const files = await discoverFiles(root, SALVAGE_PATTERNS, options.exclude);
  const found = await Promise.all(
    files.data.map(async (file) => extractRequirementIds(decodeText(await fs.readFile(file)).text, prefix)),
  );
  return { data: Array.from(new Set(found.flat())).sort(compareRequirementIds), warnings: files.warnings };
};
