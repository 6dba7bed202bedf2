import { promises as fs } from 'fs';

import type { ParseResult, ScanOptions, ScanResult, SourceScanOptions } from '../types';
import { discoverFiles, relativeTo } from '../utils/discovery';
import { decodeText } from '../utils/text';
import { mergeScanResults } from './associations';
import { scanCSharpSource } from './csharp';
import { scanPythonSource } from './python';

type SourceScanner = (text: string, options: ScanOptions) => ScanResult;

interface FileScan {
  result: ScanResult;
  warning?: string;
}

const scanFile = async (
  file: string,
  options: SourceScanOptions,
  scanner: SourceScanner,
): Promise<FileScan> => {
  const decoded = decodeText(await fs.readFile(file));
  const result = scanner(decoded.text, { prefix: options.prefix });
  return decoded.lossy
    ? { result, warning: `Undecodable bytes were dropped while reading ${relativeTo(options.root, file)}.` }
    : { result };
};

const scanSources = async (
  options: SourceScanOptions,
  scanner: SourceScanner,
): Promise<ParseResult<ScanResult>> => {
  const discovered = await discoverFiles(options.root, options.patterns, options.exclude);
  const scans = await Promise.all(discovered.data.map((file) => scanFile(file, options, scanner)));
  return {
    data: mergeScanResults(...scans.map((scan) => scan.result)),
    warnings: [...discovered.warnings, ...scans.flatMap((scan) => (scan.warning ? [scan.warning] : []))],
  };
};

export const scanCSharpSources = (options: SourceScanOptions): Promise<ParseResult<ScanResult>> =>
  scanSources(options, scanCSharpSource);

export const scanPythonSources = (options: SourceScanOptions): Promise<ParseResult<ScanResult>> =>
  scanSources(options, scanPythonSource);
