import { promises as fs } from 'fs';
import path from 'path';

import {
  discoverFiles,
  importJUnitXml,
  importTrx,
  relativeTo,
  salvageRequirementIds,
  scanCSharpSources,
  scanPythonSources,
  toRequirementMap,
  type ParseResult,
  type ScanResult,
} from '@reqtrace/adapters';
import { DEFAULT_LOCALE, TraceabilityError, describeError, resolveLocale, translate, type ResultRecord } from '@reqtrace/core';
import { buildTraceability, type EcosystemInput, type TraceabilityReport } from '@reqtrace/engine';
import { renderTraceabilityMatrix, renderValidationReport } from '@reqtrace/report';

import { loadCatalog } from './catalog';
import { loadConfig, type ConfigOverrides, type ResolvedConfig } from './config';
import type { Logger } from './logging';

export interface GenerateOptions {
  root: string;
  configPath?: string;
  overrides?: ConfigOverrides;
  /** Language of warnings, progress messages and thrown diagnostics. */
  locale?: string;
}

type Messages = (key: string, values?: Record<string, unknown>) => string;

const messagesFor =
  (locale: string): Messages =>
  (key, values) =>
    translate(key, { locale, values });

export interface GenerateResult {
  report: TraceabilityReport;
  matrixPath: string;
  reportPath: string;
  warnings: string[];
}

interface Artifact {
  target: string;
  content: string;
}

const SAMPLE_SIZE = 5;

const importAll = async (
  files: string[],
  importer: (file: string) => Promise<ParseResult<ResultRecord[]>>,
): Promise<ParseResult<ResultRecord[]>> => {
  const parsed = await Promise.all(files.map((file) => importer(file)));
  return {
    data: parsed.flatMap((result) => result.data),
    warnings: parsed.flatMap((result) => result.warnings),
  };
};

const discoverResults = async (config: ResolvedConfig, logger: Logger, warnings: string[], locale: string) => {
  const message = messagesFor(locale);
  const [trx, junit] = await Promise.all([
    discoverFiles(config.root, config.results.trx, config.exclude),
    discoverFiles(config.root, config.results.junit, config.exclude),
  ]);
  const trxFiles = trx.data;
  const junitFiles = junit.data;
  warnings.push(...trx.warnings, ...junit.warnings);

  if (trxFiles.length === 0 && junitFiles.length === 0) {
    throw new TraceabilityError('NO_RESULT_ARTIFACTS', {
      locale,
      messageParams: {
        root: config.root,
        trxPatterns: config.results.trx,
        junitPatterns: config.results.junit,
      },
    });
  }
  if (trxFiles.length === 0) {
    warnings.push(message('cli.warnings.noTrxResults', { root: config.root, patterns: config.results.trx }));
  }
  if (junitFiles.length === 0) {
    warnings.push(message('cli.warnings.noJunitResults', { root: config.root, patterns: config.results.junit }));
  }

  logger.debug(
    {
      trxFiles: trxFiles.map((file) => relativeTo(config.root, file)),
      junitFiles: junitFiles.map((file) => relativeTo(config.root, file)),
    },
    'Result artifacts discovered.',
  );
  return { trxFiles, junitFiles };
};

const sampleKeys = (result: ScanResult): string[] => Array.from(result.keys()).sort().slice(0, SAMPLE_SIZE);

interface StagedArtifact extends Artifact {
  temp: string;
  backup: string;
}

const exists = (target: string): Promise<boolean> =>
  fs.access(target).then(
    () => true,
    () => false,
  );

const writeFailed = (outputDir: string, locale: string, error: unknown, details: unknown = error): TraceabilityError =>
  new TraceabilityError('OUTPUT_WRITE_FAILED', {
    locale,
    messageParams: { outputDir, reason: describeError(error) },
    details,
  });

/**
 * Puts the previous documents back after a failed swap, so the output
 * directory never mixes documents from two runs.
 */
const rollback = async (
  staged: StagedArtifact[],
  backedUp: StagedArtifact[],
  committed: StagedArtifact[],
): Promise<void> => {
  for (const artifact of committed) {
    await fs.rm(artifact.target, { force: true });
  }
  for (const artifact of backedUp) {
    await fs.rename(artifact.backup, artifact.target);
  }
  await Promise.all(staged.map((artifact) => fs.rm(artifact.temp, { force: true })));
};

/**
 * Writes every artifact to a temporary sibling, moves the existing documents
 * aside, then renames the new ones into place. Any failure restores the
 * previous documents.
 */
export const writeArtifacts = async (
  outputDir: string,
  artifacts: Artifact[],
  locale: string = DEFAULT_LOCALE,
): Promise<void> => {
  const staged: StagedArtifact[] = artifacts.map((artifact) => ({
    ...artifact,
    temp: `${artifact.target}.${process.pid}.tmp`,
    backup: `${artifact.target}.${process.pid}.bak`,
  }));
  const backedUp: StagedArtifact[] = [];
  const committed: StagedArtifact[] = [];

  try {
    await fs.mkdir(outputDir, { recursive: true });
    await Promise.all(staged.map((artifact) => fs.writeFile(artifact.temp, artifact.content, 'utf8')));
    for (const artifact of staged) {
      if (await exists(artifact.target)) {
        await fs.rename(artifact.target, artifact.backup);
        backedUp.push(artifact);
      }
    }
    for (const artifact of staged) {
      await fs.rename(artifact.temp, artifact.target);
      committed.push(artifact);
    }
  } catch (error) {
    try {
      await rollback(staged, backedUp, committed);
    } catch (rollbackError) {
      throw writeFailed(outputDir, locale, error, { error, rollbackError });
    }
    throw writeFailed(outputDir, locale, error);
  }

  await Promise.all(backedUp.map((artifact) => fs.rm(artifact.backup, { force: true })));
};

/**
 * Discovers results and test sources under the root, joins them and writes the
 * traceability matrix and validation report. Nothing is written unless every
 * earlier step succeeded.
 */
export const runGenerate = async (options: GenerateOptions, logger: Logger): Promise<GenerateResult> => {
  const locale = resolveLocale(options.locale);
  const message = messagesFor(locale);
  const config = await loadConfig(options.root, {
    configPath: options.configPath,
    overrides: options.overrides,
    locale,
  });
  const warnings: string[] = [];
  logger.debug({ root: config.root, configPath: config.configPath, prefix: config.prefix }, 'Configuration loaded.');

  const catalog = config.catalog ? await loadCatalog(config.catalog, config.prefix, locale) : undefined;
  warnings.push(...(catalog?.warnings ?? []));

  const { trxFiles, junitFiles } = await discoverResults(config, logger, warnings, locale);
  const sourceOptions = { root: config.root, exclude: config.exclude, prefix: config.prefix };

  const [trx, junit, csharp, python] = await Promise.all([
    importAll(trxFiles, importTrx),
    importAll(junitFiles, importJUnitXml),
    scanCSharpSources({ ...sourceOptions, patterns: config.sources.csharp }),
    scanPythonSources({ ...sourceOptions, patterns: config.sources.python }),
  ]);
  warnings.push(...trx.warnings, ...junit.warnings, ...csharp.warnings, ...python.warnings);

  logger.debug(
    {
      trxResults: trx.data.length,
      junitResults: junit.data.length,
      csharpTests: csharp.data.size,
      pythonTests: python.data.size,
      csharpSample: sampleKeys(csharp.data),
      pythonSample: sampleKeys(python.data),
    },
    'Results parsed and sources scanned.',
  );

  const ecosystems: EcosystemInput[] = [
    { ecosystem: 'csharp', results: trx.data, map: toRequirementMap(csharp.data) },
    { ecosystem: 'python', results: junit.data, map: toRequirementMap(python.data) },
  ];
  let report = buildTraceability({ catalogIds: catalog?.ids, ecosystems, prefix: config.prefix });

  if (!catalog && report.requirements.length === 0) {
    const relativeOutput = relativeTo(config.root, config.outputDir);
    const insideRoot = relativeOutput.length > 0 && !relativeOutput.startsWith('..');
    const salvaged = await salvageRequirementIds(config.root, {
      prefix: config.prefix,
      exclude: insideRoot ? [...config.exclude, `${relativeOutput}/**`] : config.exclude,
    });
    warnings.push(...salvaged.warnings);
    if (salvaged.data.length > 0) {
      warnings.push(message('cli.warnings.salvage'));
      report = buildTraceability({ catalogIds: salvaged.data, ecosystems, prefix: config.prefix });
    }
  }

  // Result and source discovery walk the same tree, so directory warnings repeat.
  const distinctWarnings = Array.from(new Set(warnings));
  distinctWarnings.forEach((warning) => logger.warn({ root: config.root }, warning));

  const matrixPath = path.join(config.outputDir, config.matrixFile);
  const reportPath = path.join(config.outputDir, config.reportFile);
  await writeArtifacts(
    config.outputDir,
    [
      { target: matrixPath, content: renderTraceabilityMatrix(report) },
      { target: reportPath, content: renderValidationReport(report) },
    ],
    locale,
  );

  logger.info(
    { matrixPath, reportPath },
    message('cli.generate.completed', {
      total: report.summary.total,
      covered: report.summary.covered,
      coveragePercent: report.summary.percentages.covered,
    }),
  );
  logger.info({ outputDir: config.outputDir }, message('cli.generate.written', { outputDir: config.outputDir }));

  return { report, matrixPath, reportPath, warnings: distinctWarnings };
};
