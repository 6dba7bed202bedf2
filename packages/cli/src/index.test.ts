import { promises as fs } from 'fs';
import path from 'path';

import { captureLogger, copyFixture, pathExists, pumpProjectFixture } from './__fixtures__/project';
import { __internal, createCli, exitCodes } from './index';

describe('reqtrace CLI', () => {
  const roots: string[] = [];

  const project = async (): Promise<string> => {
    const root = await copyFixture(pumpProjectFixture);
    roots.push(root);
    return root;
  };

  afterEach(() => {
    process.exitCode = undefined;
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await Promise.all(roots.map((root) => fs.rm(root, { recursive: true, force: true })));
  });

  it('generates both artifacts when no command is given', async () => {
    const root = await project();
    const { logger } = captureLogger();

    await createCli(['--root', root], logger).parseAsync();

    expect(process.exitCode).toBe(exitCodes.success);
    const report = await fs.readFile(path.join(root, 'artifacts', 'validation_report.md'), 'utf8');
    expect(report.split('\n')).toContain('- **Covered**: 2 (67%)');
  });

  it('writes to the directory given by --output-dir', async () => {
    const root = await project();
    const { logger } = captureLogger();

    await createCli(['generate', '--root', root, '-o', 'out'], logger).parseAsync();

    expect(process.exitCode).toBe(exitCodes.success);
    await expect(pathExists(path.join(root, 'out', 'traceability_matrix.md'))).resolves.toBe(true);
  });

  it('exits with 2 when no result artifacts are found', async () => {
    const root = await project();
    await fs.rm(path.join(root, 'results'), { recursive: true });
    const { logger, entries } = captureLogger();

    await createCli(['generate', '--root', root], logger).parseAsync();

    expect(process.exitCode).toBe(exitCodes.noResults);
    expect(entries()).toEqual(
      expect.arrayContaining([expect.objectContaining({ level: 50, code: 'NO_RESULT_ARTIFACTS', command: 'generate' })]),
    );
    await expect(pathExists(path.join(root, 'artifacts'))).resolves.toBe(false);
  });

  it('exits with 2 when the root does not exist', async () => {
    const root = path.join(await project(), 'missing-root');
    const { logger, entries } = captureLogger();

    await createCli(['generate', '--root', root], logger).parseAsync();

    expect(process.exitCode).toBe(exitCodes.noResults);
    expect(entries()).toEqual(
      expect.arrayContaining([expect.objectContaining({ level: 50, code: 'NO_RESULT_ARTIFACTS', command: 'generate' })]),
    );
    expect(entries()).not.toEqual(expect.arrayContaining([expect.objectContaining({ err: expect.anything() })]));
  });

  it('exits with 3 when the catalog cannot be read', async () => {
    const root = await project();
    const { logger, entries } = captureLogger();

    await createCli(['generate', '--root', root, '--catalog', 'missing.yaml'], logger).parseAsync();

    expect(process.exitCode).toBe(exitCodes.error);
    expect(entries()).toEqual(
      expect.arrayContaining([expect.objectContaining({ level: 50, code: 'CATALOG_UNREADABLE' })]),
    );
  });

  it('localizes diagnostics', async () => {
    const root = await project();
    await fs.rm(path.join(root, 'results'), { recursive: true });
    const { logger, entries } = captureLogger();

    await createCli(['--root', root, '--locale', 'tr'], logger).parseAsync();

    expect(entries()).toEqual(
      expect.arrayContaining([
        expect.objectContaining({
          level: 50,
          msg: expect.stringMatching(/^.+ altında test sonuç dosyası bulunamadı\. Aranan TRX desenleri: \*\*\/\*\.trx;/),
        }),
      ]),
    );
  });

  it('prints parsed TRX records', async () => {
    const root = await project();
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const { logger } = captureLogger();

    await createCli(['parse-trx', path.join(root, 'results', 'ControllerTests.trx')], logger).parseAsync();

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      data: [{ name: 'test_subcool_trip', outcome: 'Passed', rawOutcome: 'Passed', categories: ['REQ-001'] }],
      warnings: [],
    });
  });

  it('prints parsed JUnit records', async () => {
    const root = await project();
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const { logger } = captureLogger();

    await createCli(['parse-junit', path.join(root, 'results', 'junit-python.xml')], logger).parseAsync();

    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      data: [{ name: 'test_boundary_low_pressure', outcome: 'Failed', rawOutcome: 'failure', categories: [] }],
      warnings: [],
    });
  });

  it('prints the associations found by scanning sources', async () => {
    const root = await project();
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const { logger } = captureLogger();

    await createCli(['scan', '--root', root], logger).parseAsync();

    expect(process.exitCode).toBe(exitCodes.success);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      csharp: {},
      python: { test_boundary_low_pressure: { 'REQ-002': 'metadata' } },
      warnings: [],
    });
  });

  it('reports the package version, with the commit when one is stamped', () => {
    expect(__internal.cliVersion('')).toBe('0.1.0');
    expect(__internal.cliVersion('abc1234')).toBe('0.1.0 (commit abc1234)');
  });

  it('logs non-Error failures in the requested language', () => {
    const { logger, entries } = captureLogger();

    __internal.logCliError(logger, 42, { command: 'test' }, 'tr');

    expect(entries()).toEqual([
      expect.objectContaining({ level: 50, command: 'test', msg: 'Komut beklenmedik şekilde başarısız oldu.' }),
    ]);
  });

  it('logs non-Error failures with a generic message', () => {
    const { logger, entries } = captureLogger();

    __internal.logCliError(logger, 42, { command: 'test' });

    expect(entries()).toEqual([
      expect.objectContaining({ level: 50, command: 'test', error: { message: '42' }, msg: 'The command failed unexpectedly.' }),
    ]);
  });
});
