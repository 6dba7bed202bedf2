import {
  DEFAULT_REQUIREMENT_PREFIX,
  extractRequirementIds,
  extractRequirementIdsFromName,
} from '@reqtrace/core';

import type { ScanOptions, ScanResult } from '../types';
import { mergeScanResults, recordAssociations } from './associations';

const DEF_LINE = /^\s*(?:async\s+)?def\s+(test_\w+)\s*\(/;
const DECORATOR_LINE = /^\s*@/;
const MARKER_DECORATOR = /^\s*@(?:pytest\.)?mark\.\w+\s*\(/;

const DOCSTRING_PATTERN =
  /^[ \t]*(?:async\s+)?def\s+(test_\w+)\s*\((?:[^()]|\([^()]*\))*\)\s*(?:->[^:\n]*)?:[ \t]*(?:#[^\n]*)?\r?\n(?:[ \t]*\r?\n)*[ \t]*[rRuUbB]{0,2}("""[\s\S]*?"""|'''[\s\S]*?''')/gm;

const splitLines = (text: string): string[] => text.split(/\r?\n/);

/** Net parenthesis depth of a line, ignoring quoted text and comments. */
const parenthesisBalance = (line: string): number => {
  const code = line.replace(/"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/g, '').replace(/#.*$/, '');
  return (code.match(/\(/g)?.length ?? 0) - (code.match(/\)/g)?.length ?? 0);
};

interface DecoratorBlock {
  decorators: string[];
  depth: number;
}

/**
 * Heuristic 1: `@pytest.mark.<marker>("REQ-001", ...)` lines in the decorator
 * block directly above a `def test_*`. Decorators spanning several lines are
 * joined until their parentheses balance.
 */
export const scanMarkers = (text: string, prefix: string): ScanResult => {
  const result: ScanResult = new Map();
  let block: DecoratorBlock = { decorators: [], depth: 0 };

  splitLines(text).forEach((line) => {
    if (block.depth > 0) {
      block.decorators[block.decorators.length - 1] += `\n${line}`;
      block.depth += parenthesisBalance(line);
      return;
    }
    if (DECORATOR_LINE.test(line)) {
      block.decorators.push(line);
      block.depth = Math.max(0, parenthesisBalance(line));
      return;
    }
    const definition = line.match(DEF_LINE);
    if (definition) {
      const ids = block.decorators
        .filter((decorator) => MARKER_DECORATOR.test(decorator))
        .flatMap((decorator) => extractRequirementIds(decorator, prefix));
      recordAssociations(result, definition[1], ids, 'metadata');
    }
    if (line.trim().length > 0 && !line.trim().startsWith('#')) {
      block = { decorators: [], depth: 0 };
    }
  });

  return result;
};

/** Heuristic 2: identifiers embedded in the function name itself. */
export const scanNames = (text: string, prefix: string): ScanResult => {
  const result: ScanResult = new Map();
  splitLines(text).forEach((line) => {
    const definition = line.match(DEF_LINE);
    if (definition) {
      recordAssociations(result, definition[1], extractRequirementIdsFromName(definition[1], prefix), 'name');
    }
  });
  return result;
};

/** Heuristic 3: a docstring that is the first statement of the test body. */
export const scanDocstrings = (text: string, prefix: string): ScanResult => {
  const result: ScanResult = new Map();
  for (const match of text.matchAll(DOCSTRING_PATTERN)) {
    recordAssociations(result, match[1], extractRequirementIds(match[2], prefix), 'docstring');
  }
  return result;
};

interface ProximityState {
  currentTest?: string;
  decoratorDepth: number;
  found: ScanResult;
}

/**
 * Heuristic 4: every identifier on a line after a `def test_*` belongs to that
 * test until the next one starts. Decorator lines belong to the definition
 * that follows them and are skipped.
 */
export const scanProximity = (text: string, prefix: string): ScanResult =>
  splitLines(text).reduce<ProximityState>(
    (state, line) => {
      if (state.decoratorDepth > 0) {
        return { ...state, decoratorDepth: Math.max(0, state.decoratorDepth + parenthesisBalance(line)) };
      }
      if (DECORATOR_LINE.test(line)) {
        return { ...state, decoratorDepth: Math.max(0, parenthesisBalance(line)) };
      }
      const definition = line.match(DEF_LINE);
      const currentTest = definition ? definition[1] : state.currentTest;
      if (currentTest) {
        recordAssociations(state.found, currentTest, extractRequirementIds(line, prefix), 'proximity');
      }
      return { ...state, currentTest };
    },
    { decoratorDepth: 0, found: new Map() },
  ).found;

/**
 * Maps pytest functions to requirement identifiers. The four heuristics run
 * independently and are unioned; a lower-confidence one never replaces what a
 * higher-confidence one found.
 */
export const scanPythonSource = (text: string, options: ScanOptions = {}): ScanResult => {
  const prefix = options.prefix ?? DEFAULT_REQUIREMENT_PREFIX;
  return mergeScanResults(
    scanMarkers(text, prefix),
    scanNames(text, prefix),
    scanDocstrings(text, prefix),
    scanProximity(text, prefix),
  );
};
