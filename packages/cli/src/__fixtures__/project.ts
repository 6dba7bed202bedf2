import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { createLogger, type Logger } from '../logging';

export const pumpProjectFixture = path.resolve(__dirname, '../../fixtures/pump-project');

export interface CapturedLogger {
  logger: Logger;
  entries: () => unknown[];
}

/** A debug-level logger whose JSON lines are kept in memory. */
export const captureLogger = (): CapturedLogger => {
  const lines: string[] = [];
  const logger = createLogger({
    verbose: true,
    destination: {
      write: (line: string) => {
        lines.push(line);
      },
    },
  });
  return { logger, entries: () => lines.map((line): unknown => JSON.parse(line)) };
};

export const copyFixture = async (fixture: string): Promise<string> => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'reqtrace-cli-'));
  await fs.cp(fixture, root, { recursive: true });
  return root;
};

export const pathExists = async (target: string): Promise<boolean> =>
  fs.access(target).then(
    () => true,
    () => false,
  );
