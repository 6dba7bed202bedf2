#!/usr/bin/env node
import path from 'path';

import yargs, { type Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';

import {
  describeScanResult,
  importJUnitXml,
  importTrx,
  scanCSharpSources,
  scanPythonSources,
} from '@reqtrace/adapters';
import { DEFAULT_LOCALE, TraceabilityError, getAvailableLocales, translate } from '@reqtrace/core';

import packageInfo from '../package.json';
import { loadConfig } from './config';
import { runGenerate } from './generate';
import { createLogger, type Logger } from './logging';

const exitCodes = {
  success: 0,
  noResults: 2,
  error: 3,
} as const;

interface GlobalArguments {
  verbose?: boolean;
  locale?: string;
}

/** Release builds stamp the commit through `REQTRACE_COMMIT`. */
const cliVersion = (commit: string | undefined = process.env.REQTRACE_COMMIT): string =>
  commit ? `${packageInfo.version} (commit ${commit})` : packageInfo.version;

const logCliError = (
  logger: Logger,
  error: unknown,
  context: Record<string, unknown> = {},
  locale: string = DEFAULT_LOCALE,
): void => {
  if (error instanceof TraceabilityError) {
    logger.error({ ...context, code: error.code }, error.message);
    return;
  }

  if (error instanceof Error) {
    logger.error({ ...context, err: error }, error.message);
    return;
  }

  logger.error(
    {
      ...context,
      error: { message: String(error) },
    },
    translate('cli.errors.unexpected', { locale }),
  );
};

const exitCodeFor = (error: unknown): number =>
  error instanceof TraceabilityError && error.code === 'NO_RESULT_ARTIFACTS' ? exitCodes.noResults : exitCodes.error;

const printJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

const withProjectOptions = <T>(command: Argv<T>) =>
  command
    .option('root', {
      describe: 'Project root that is searched for sources and results.',
      type: 'string',
      default: process.cwd(),
    })
    .option('config', {
      alias: 'c',
      describe: 'YAML configuration file (default: reqtrace.config.yaml in the root, when present).',
      type: 'string',
    })
    .option('prefix', {
      describe: 'Requirement identifier prefix.',
      type: 'string',
    });

/**
 * Builds the command line parser. The logger is created from `--verbose`
 * unless one is supplied.
 */
export const createCli = (args: string[], injectedLogger?: Logger) => {
  let sharedLogger: Logger | undefined = injectedLogger;
  const getLogger = (argv: GlobalArguments): Logger => {
    if (!sharedLogger) {
      sharedLogger = createLogger({ verbose: Boolean(argv.verbose) });
    }
    return sharedLogger;
  };

  return yargs(args)
    .scriptName('reqtrace')
    .usage('$0 [command] [options]')
    .option('verbose', {
      describe: 'Debug-level JSON logs.',
      type: 'boolean',
      global: true,
      default: false,
    })
    .option('locale', {
      describe: 'Preferred language for CLI messages (for example en or tr).',
      type: 'string',
      global: true,
      choices: getAvailableLocales(),
      default: DEFAULT_LOCALE,
    })
    .version('version', 'Show version information.', cliVersion())
    .command(
      ['generate', '$0'],
      'Write the traceability matrix and validation report.',
      (command) =>
        withProjectOptions(command)
          .option('catalog', {
            describe: 'Requirements catalog (JSON or YAML).',
            type: 'string',
          })
          .option('output-dir', {
            alias: 'o',
            describe: 'Directory the two markdown artifacts are written to.',
            type: 'string',
          }),
      async (argv) => {
        const logger = getLogger(argv);
        const root = path.resolve(argv.root);
        const context = { command: 'generate', root };
        try {
          await runGenerate(
            {
              root,
              configPath: argv.config,
              overrides: { prefix: argv.prefix, catalog: argv.catalog, outputDir: argv.outputDir },
              locale: argv.locale,
            },
            logger,
          );
          process.exitCode = exitCodes.success;
        } catch (error) {
          logCliError(logger, error, context, argv.locale);
          process.exitCode = exitCodeFor(error);
        }
      },
    )
    .command(
      'parse-junit <file>',
      'Print the records read from one JUnit XML file.',
      (command) => command.positional('file', { type: 'string', demandOption: true }),
      async (argv) => {
        const logger = getLogger(argv);
        try {
          printJson(await importJUnitXml(argv.file));
          process.exitCode = exitCodes.success;
        } catch (error) {
          logCliError(logger, error, { command: 'parse-junit', file: argv.file }, argv.locale);
          process.exitCode = exitCodes.error;
        }
      },
    )
    .command(
      'parse-trx <file>',
      'Print the records read from one TRX file.',
      (command) => command.positional('file', { type: 'string', demandOption: true }),
      async (argv) => {
        const logger = getLogger(argv);
        try {
          printJson(await importTrx(argv.file));
          process.exitCode = exitCodes.success;
        } catch (error) {
          logCliError(logger, error, { command: 'parse-trx', file: argv.file }, argv.locale);
          process.exitCode = exitCodes.error;
        }
      },
    )
    .command(
      'scan',
      'Print the test-to-requirement associations found in C# and Python sources.',
      (command) => withProjectOptions(command),
      async (argv) => {
        const logger = getLogger(argv);
        const context = { command: 'scan', root: argv.root };
        try {
          const config = await loadConfig(argv.root, {
            configPath: argv.config,
            overrides: { prefix: argv.prefix },
            locale: argv.locale,
          });
          const sourceOptions = { root: config.root, exclude: config.exclude, prefix: config.prefix };
          const [csharp, python] = await Promise.all([
            scanCSharpSources({ ...sourceOptions, patterns: config.sources.csharp }),
            scanPythonSources({ ...sourceOptions, patterns: config.sources.python }),
          ]);
          printJson({
            csharp: describeScanResult(csharp.data),
            python: describeScanResult(python.data),
            warnings: [...csharp.warnings, ...python.warnings],
          });
          process.exitCode = exitCodes.success;
        } catch (error) {
          logCliError(logger, error, context, argv.locale);
          process.exitCode = exitCodes.error;
        }
      },
    )
    .strict()
    .help()
    .alias('help', 'h')
    .wrap(100);
};

if (require.main === module) {
  createCli(hideBin(process.argv))
    .parseAsync()
    .catch((error: unknown) => {
      logCliError(createLogger(), error);
      process.exitCode = exitCodes.error;
    });
}

export const __internal = {
  cliVersion,
  logCliError,
  exitCodeFor,
};

export { exitCodes };
export { runGenerate, writeArtifacts, type GenerateOptions, type GenerateResult } from './generate';
export { loadConfig, parseConfigFile, DEFAULT_CONFIG_FILE, type ResolvedConfig } from './config';
export { loadCatalog } from './catalog';
export { createLogger, type Logger } from './logging';
