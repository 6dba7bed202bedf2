import type { RequirementId } from '@reqtrace/core';

export interface ParseResult<T> {
  data: T;
  warnings: string[];
}

/** Ordered from most to least confident. */
export const heuristics = ['metadata', 'name', 'docstring', 'proximity'] as const;
export type Heuristic = (typeof heuristics)[number];

/**
 * Test name to the requirements found for it, each remembering the most
 * confident heuristic that produced it.
 */
export type ScanResult = Map<string, Map<RequirementId, Heuristic>>;

export interface ScanOptions {
  prefix?: string;
}

export interface SourceScanOptions extends ScanOptions {
  root: string;
  patterns: string[];
  exclude?: string[];
}

export interface DecodedText {
  text: string;
  encoding: 'utf-8' | 'utf-16le' | 'utf-16be';
  lossy: boolean;
}
