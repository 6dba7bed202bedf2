import { createReadStream } from 'fs';
import path from 'path';

import { SaxesParser } from 'saxes';

import { describeError, type ResultRecord } from '@reqtrace/core';

import type { ParseResult } from '../types';
import { attributeText, localName } from '../utils/xml';

type Marker = 'skipped' | 'failure' | 'error';

interface ActiveProperty {
  name?: string;
  valueAttr?: string;
  buffer: string[];
}

interface TestcaseState {
  name: string;
  markers: Set<Marker>;
  categories: Set<string>;
  activeProperty?: ActiveProperty;
}

const REQUIREMENT_PROPERTIES = new Set(['requirements', 'requirement', 'requirementids']);

/** `test_foo[param-1]` and `test_foo(1, 2)` both become `test_foo`. */
export const canonicalCaseName = (name: string): string => name.split(/[[(]/u, 1)[0].trim();

const tokenizeCategories = (input: string): string[] =>
  input
    .split(/[,;\s]+/u)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

// Skip markers take precedence over failure markers.
const resolveMarkers = (markers: Set<Marker>): { outcome: ResultRecord['outcome']; rawOutcome: string } => {
  if (markers.has('skipped')) {
    return { outcome: 'Skipped', rawOutcome: 'skipped' };
  }
  if (markers.has('failure')) {
    return { outcome: 'Failed', rawOutcome: 'failure' };
  }
  if (markers.has('error')) {
    return { outcome: 'Failed', rawOutcome: 'error' };
  }
  return { outcome: 'Passed', rawOutcome: 'passed' };
};

export const parseJUnitStream = async (filePath: string): Promise<ParseResult<ResultRecord[]>> =>
  new Promise((resolve, reject) => {
    const location = path.resolve(filePath);
    const warnings: string[] = [];
    const results: ResultRecord[] = [];
    const stream = createReadStream(location, { encoding: 'utf8' });
    const parser = new SaxesParser({ xmlns: false });
    let currentTest: TestcaseState | undefined;
    let caseCounter = 0;
    let settled = false;

    const fail = (error: unknown, prefix: string) => {
      if (settled) {
        return;
      }
      settled = true;
      stream.destroy();
      const message = describeError(error);
      reject(new Error(`${prefix} at ${location}: ${message}`));
    };

    const closeProperty = (test: TestcaseState) => {
      const property = test.activeProperty;
      if (property?.name && REQUIREMENT_PROPERTIES.has(property.name)) {
        tokenizeCategories(property.valueAttr ?? property.buffer.join('')).forEach((token) =>
          test.categories.add(token),
        );
      }
      test.activeProperty = undefined;
    };

    const finalizeCurrentTest = () => {
      if (!currentTest) {
        return;
      }
      closeProperty(currentTest);
      const { outcome, rawOutcome } = resolveMarkers(currentTest.markers);
      results.push({
        name: currentTest.name,
        outcome,
        rawOutcome,
        categories: Array.from(currentTest.categories),
      });
      currentTest = undefined;
    };

    parser.on('error', (error) => fail(error, 'Invalid JUnit XML'));

    parser.on('opentag', (tag) => {
      const name = localName(tag.name).toLowerCase();
      if (name === 'testcase') {
        finalizeCurrentTest();
        caseCounter += 1;
        const rawName = attributeText(tag.attributes, 'name');
        const canonical = rawName ? canonicalCaseName(rawName) : '';
        currentTest = {
          name: canonical.length > 0 ? canonical : `case-${caseCounter}`,
          markers: new Set(),
          categories: new Set(),
        };
        return;
      }

      if (!currentTest) {
        return;
      }

      if (name === 'skipped' || name === 'failure' || name === 'error') {
        currentTest.markers.add(name);
        return;
      }

      if (name === 'property') {
        currentTest.activeProperty = {
          name: attributeText(tag.attributes, 'name')?.toLowerCase(),
          valueAttr: attributeText(tag.attributes, 'value'),
          buffer: [],
        };
      }
    });

    parser.on('text', (text) => {
      currentTest?.activeProperty?.buffer.push(text);
    });

    parser.on('closetag', (tag) => {
      const name = localName(tag.name).toLowerCase();
      if (!currentTest) {
        return;
      }
      if (name === 'property') {
        closeProperty(currentTest);
        return;
      }
      if (name === 'testcase') {
        finalizeCurrentTest();
      }
    });

    parser.on('end', () => {
      if (settled) {
        return;
      }
      finalizeCurrentTest();
      if (caseCounter === 0) {
        warnings.push(`No <testcase> elements found in ${location}.`);
      }
      settled = true;
      resolve({ data: results, warnings });
    });

    stream.on('error', (error) => fail(error, 'Unable to read JUnit XML'));
    stream.on('data', (chunk) => {
      if (settled) {
        return;
      }
      try {
        parser.write(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      } catch (error) {
        fail(error, 'Invalid JUnit XML');
      }
    });
    stream.on('end', () => {
      if (settled) {
        return;
      }
      try {
        parser.close();
      } catch (error) {
        fail(error, 'Invalid JUnit XML');
      }
    });
  });
