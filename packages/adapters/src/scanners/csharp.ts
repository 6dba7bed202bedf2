import {
  DEFAULT_REQUIREMENT_PREFIX,
  extractRequirementIds,
  extractRequirementIdsFromName,
  type RequirementId,
} from '@reqtrace/core';

import type { ScanOptions, ScanResult } from '../types';
import { recordAssociations } from './associations';

/** Attribute names that make a method a test across NUnit, MSTest and xUnit. */
export const TEST_DESIGNATORS = new Set([
  'Test',
  'TestMethod',
  'DataTestMethod',
  'Theory',
  'Fact',
  'TestCase',
  'TestCaseSource',
  'TestOf',
]);

/** One `[...]` attribute section; `]` inside a string literal does not close it. */
const ATTRIBUTE_SECTION = String.raw`\[(?:@"(?:[^"]|"")*"|"(?:[^"\\]|\\.)*"|[^\]"])*\]`;

/** Type arguments nested up to three levels: `Task<List<Dictionary<string, int>>>`. */
const TYPE_ARGUMENTS = String.raw`<(?:[^<>]|<(?:[^<>]|<[^<>]*>)*>)*>`;

const METHOD_PATTERN = new RegExp(
  String.raw`^[ \t]*(?<attrs>(?:${ATTRIBUTE_SECTION}\s*)*)(?:(?:public|private|internal|protected|static|async|virtual|override|sealed|new)\s+)+(?:void|Task|ValueTask)(?:${TYPE_ARGUMENTS})?\s+(?<name>\w+)\s*\(`,
  'gm',
);

const CONTAINER_PATTERN = new RegExp(
  String.raw`^[ \t]*(?<attrs>(?:${ATTRIBUTE_SECTION}\s*)*)(?:(?:public|private|internal|protected|static|sealed|abstract|partial)\s+)*(?:class|record|struct)\s+(?<name>\w+)[^{;]*\{`,
  'gm',
);

const ATTRIBUTE_SECTIONS = new RegExp(ATTRIBUTE_SECTION, 'g');

const CATEGORY_PATTERN = /\b(?:Test)?Category\s*\(([^)]*)\)/g;

interface Container {
  start: number;
  end: number;
  requirementIds: RequirementId[];
}

const stripArguments = (value: string): string => {
  let current = value;
  let previous: string | undefined;
  while (current !== previous) {
    previous = current;
    current = current.replace(/\([^()]*\)/g, '');
  }
  return current;
};

/**
 * Attribute names in a block such as `[Test, Category("REQ-001")]
 * [NUnit.Framework.TestCase(1)]`. Arguments are dropped before splitting on
 * commas.
 */
export const attributeNames = (block: string): string[] =>
  Array.from(block.matchAll(ATTRIBUTE_SECTIONS)).flatMap((match) =>
    stripArguments(match[0].slice(1, -1).replace(/@"(?:[^"]|"")*"|"(?:[^"\\]|\\.)*"/g, '""'))
      .split(',')
      .map((entry) => entry.trim().split('.').pop() ?? '')
      .map((entry) => entry.replace(/Attribute$/, ''))
      .filter((entry) => entry.length > 0),
  );

export const isTestAttributeBlock = (block: string): boolean =>
  attributeNames(block).some((name) => TEST_DESIGNATORS.has(name));

export const categoryRequirementIds = (block: string, prefix: string): RequirementId[] =>
  Array.from(
    new Set(Array.from(block.matchAll(CATEGORY_PATTERN)).flatMap((match) => extractRequirementIds(match[1], prefix))),
  );

const skipQuoted = (text: string, index: number, quote: string, verbatim: boolean): number => {
  let cursor = index + 1;
  while (cursor < text.length) {
    const char = text[cursor];
    if (!verbatim && char === '\\') {
      cursor += 2;
      continue;
    }
    if (char === quote) {
      if (verbatim && text[cursor + 1] === quote) {
        cursor += 2;
        continue;
      }
      return cursor + 1;
    }
    cursor += 1;
  }
  return cursor;
};

/**
 * Index of the `}` closing the brace at `openIndex`, ignoring braces inside
 * comments, strings and character literals. Returns the text length when the
 * brace is never closed.
 */
export const findClosingBrace = (text: string, openIndex: number): number => {
  let depth = 0;
  let cursor = openIndex;
  while (cursor < text.length) {
    const char = text[cursor];
    const next = text[cursor + 1];
    if (char === '/' && next === '/') {
      const lineEnd = text.indexOf('\n', cursor);
      cursor = lineEnd === -1 ? text.length : lineEnd + 1;
      continue;
    }
    if (char === '/' && next === '*') {
      const commentEnd = text.indexOf('*/', cursor + 2);
      cursor = commentEnd === -1 ? text.length : commentEnd + 2;
      continue;
    }
    if (char === '@' && next === '"') {
      cursor = skipQuoted(text, cursor + 1, '"', true);
      continue;
    }
    if (char === '"' || char === "'") {
      cursor = skipQuoted(text, cursor, char, false);
      continue;
    }
    if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return cursor;
      }
    }
    cursor += 1;
  }
  return text.length;
};

const collectContainers = (text: string, prefix: string): Container[] =>
  Array.from(text.matchAll(CONTAINER_PATTERN)).flatMap((match) => {
    const requirementIds = categoryRequirementIds(match.groups?.attrs ?? '', prefix);
    if (requirementIds.length === 0 || match.index === undefined) {
      return [];
    }
    const open = match.index + match[0].length - 1;
    return [{ start: open, end: findClosingBrace(text, open), requirementIds }];
  });

/**
 * Maps NUnit/MSTest/xUnit test methods to requirement identifiers found in
 * `[Category]`/`[TestCategory]` attributes on the method or on any enclosing
 * class, plus identifiers embedded in the method name.
 */
export const scanCSharpSource = (text: string, options: ScanOptions = {}): ScanResult => {
  const prefix = options.prefix ?? DEFAULT_REQUIREMENT_PREFIX;
  const result: ScanResult = new Map();
  const containers = collectContainers(text, prefix);

  for (const match of text.matchAll(METHOD_PATTERN)) {
    const attrs = match.groups?.attrs ?? '';
    const name = match.groups?.name;
    if (!name || match.index === undefined || !isTestAttributeBlock(attrs)) {
      continue;
    }
    const position = match.index + match[0].length;
    const inherited = containers
      .filter((container) => position > container.start && position < container.end)
      .flatMap((container) => container.requirementIds);

    recordAssociations(result, name, categoryRequirementIds(attrs, prefix), 'metadata');
    recordAssociations(result, name, inherited, 'metadata');
    recordAssociations(result, name, extractRequirementIdsFromName(name, prefix), 'name');
  }

  return result;
};
