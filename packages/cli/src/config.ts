import { promises as fs } from 'fs';
import path from 'path';

import YAML from 'yaml';
import { z } from 'zod';

import {
  DEFAULT_LOCALE,
  DEFAULT_REQUIREMENT_PREFIX,
  TraceabilityError,
  describeError,
  errorCode,
} from '@reqtrace/core';

export const DEFAULT_CONFIG_FILE = 'reqtrace.config.yaml';

export const defaultPatterns = {
  csharp: ['tests/**/*.cs', '**/test_*.cs'],
  python: ['tests/**/*.py', '**/test_*.py'],
  trx: ['**/*.trx'],
  junit: ['tests/python/**/*.xml', '**/junit*.xml', '**/test-results*.xml', '**/TestResult*.xml'],
};

const patternList = z
  .union([z.string().min(1), z.array(z.string().min(1))])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const fileName = z
  .string()
  .min(1)
  .refine((value) => path.basename(value) === value, 'Expected a file name without directories.');

export const configFileSchema = z
  .object({
    prefix: z
      .string()
      .regex(/^[A-Za-z]+$/, 'The prefix may only contain letters.')
      .optional(),
    catalog: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    matrixFile: fileName.optional(),
    reportFile: fileName.optional(),
    sources: z
      .object({
        csharp: patternList.optional(),
        python: patternList.optional(),
      })
      .strict()
      .optional(),
    results: z
      .object({
        trx: patternList.optional(),
        junit: patternList.optional(),
      })
      .strict()
      .optional(),
    exclude: patternList.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Command line values; each one wins over the configuration file. */
export interface ConfigOverrides {
  prefix?: string;
  catalog?: string;
  outputDir?: string;
}

export interface ResolvedConfig {
  root: string;
  configPath?: string;
  prefix: string;
  catalog?: string;
  outputDir: string;
  matrixFile: string;
  reportFile: string;
  sources: { csharp: string[]; python: string[] };
  results: { trx: string[]; junit: string[] };
  exclude: string[];
}

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

const invalidConfig = (configPath: string, reason: string, locale: string, details?: unknown): TraceabilityError =>
  new TraceabilityError('CONFIG_INVALID', {
    locale,
    messageParams: { path: configPath, reason },
    details,
  });

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

export const parseConfigFile = (content: string, configPath: string, locale: string = DEFAULT_LOCALE): ConfigFile => {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    throw invalidConfig(configPath, describeError(error), locale);
  }
  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw invalidConfig(configPath, formatIssues(parsed.error), locale, parsed.error.issues);
  }
  return parsed.data;
};

export interface LoadConfigOptions {
  /** An explicit path must exist; the default file is optional. */
  configPath?: string;
  overrides?: ConfigOverrides;
  /** Language of the diagnostics thrown while loading. */
  locale?: string;
}

export const loadConfig = async (root: string, options: LoadConfigOptions = {}): Promise<ResolvedConfig> => {
  const locale = options.locale ?? DEFAULT_LOCALE;
  const base = path.resolve(root);
  const configPath = path.resolve(base, options.configPath ?? DEFAULT_CONFIG_FILE);
  const present = Boolean(options.configPath) || (await fileExists(configPath));
  let file: ConfigFile = {};

  if (present) {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf8');
    } catch (error) {
      throw invalidConfig(configPath, describeError(error), locale);
    }
    file = parseConfigFile(content, configPath, locale);
  }

  const overrides = options.overrides ?? {};
  const catalog = overrides.catalog ?? file.catalog;

  return {
    root: base,
    configPath: present ? configPath : undefined,
    prefix: (overrides.prefix ?? file.prefix ?? DEFAULT_REQUIREMENT_PREFIX).toUpperCase(),
    catalog: catalog ? path.resolve(base, catalog) : undefined,
    outputDir: path.resolve(base, overrides.outputDir ?? file.outputDir ?? 'artifacts'),
    matrixFile: file.matrixFile ?? 'traceability_matrix.md',
    reportFile: file.reportFile ?? 'validation_report.md',
    sources: {
      csharp: file.sources?.csharp ?? defaultPatterns.csharp,
      python: file.sources?.python ?? defaultPatterns.python,
    },
    results: {
      trx: file.results?.trx ?? defaultPatterns.trx,
      junit: file.results?.junit ?? defaultPatterns.junit,
    },
    exclude: file.exclude ?? [],
  };
};
