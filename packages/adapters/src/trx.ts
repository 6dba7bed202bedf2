import { promises as fs } from 'fs';
import path from 'path';

import { describeError, normalizeOutcome, type ResultRecord } from '@reqtrace/core';

import type { ParseResult } from './types';
import { decodeText } from './utils/text';
import { attributeText, elementText, findElements, hasElement, parseXml, type XmlElement } from './utils/xml';

const firstAttribute = (element: XmlElement, names: string[]): string | undefined => {
  for (const name of names) {
    const value = attributeText(element, name)?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
};

/**
 * MSTest writes `<TestCategoryItem TestCategory="REQ-001" />` inside a
 * `<TestCategory>` wrapper. Other loggers drop the wrapper, use `name=` or put
 * the value in the element text.
 */
const readCategories = (unitTest: XmlElement): string[] => {
  const values = findElements(unitTest, 'TestCategoryItem')
    .map((item) => firstAttribute(item, ['TestCategory', 'name']) ?? elementText(item))
    .filter((value): value is string => value !== undefined && value.length > 0);
  return Array.from(new Set(values));
};

const indexCategories = (root: XmlElement): Map<string, string[]> => {
  const categories = new Map<string, string[]>();
  findElements(root, 'UnitTest').forEach((unitTest) => {
    const id = attributeText(unitTest, 'id');
    if (id) {
      categories.set(id, [...(categories.get(id) ?? []), ...readCategories(unitTest)]);
    }
  });
  return categories;
};

const toRecord = (result: XmlElement, categories: Map<string, string[]>): ResultRecord => {
  const name = firstAttribute(result, ['testName', 'testname', 'executionId', 'testId']) ?? 'Unknown';
  const rawOutcome = firstAttribute(result, ['outcome', 'result']);
  const testId = attributeText(result, 'testId');
  const carried = testId ? categories.get(testId) ?? [] : [];

  if (rawOutcome) {
    return { name, outcome: normalizeOutcome(rawOutcome), rawOutcome, categories: carried };
  }

  // No outcome string: failure evidence in the output decides, otherwise Unknown.
  const failed = hasElement(result, 'ErrorInfo') || hasElement(result, 'Message');
  return { name, outcome: failed ? 'Failed' : 'Unknown', categories: carried };
};

export const parseTrx = (content: string, location = 'TRX document'): ParseResult<ResultRecord[]> => {
  const root = parseXml(content);
  const categories = indexCategories(root);
  const results = findElements(root, 'UnitTestResult').map((result) => toRecord(result, categories));
  const warnings = results.length === 0 ? [`No <UnitTestResult> elements found in ${location}.`] : [];
  return { data: results, warnings };
};

export const importTrx = async (filePath: string): Promise<ParseResult<ResultRecord[]>> => {
  const location = path.resolve(filePath);
  try {
    const { text } = decodeText(await fs.readFile(location));
    return parseTrx(text, location);
  } catch (error) {
    const message = describeError(error);
    return { data: [], warnings: [`Unable to parse TRX file at ${location}: ${message}`] };
  }
};
