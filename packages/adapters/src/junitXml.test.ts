import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { canonicalCaseName, importJUnitXml, parseJUnitStream } from './index';

describe('JUnit XML import', () => {
  const tempDirs: string[] = [];

  afterAll(async () => {
    await Promise.all(tempDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  const writeTemp = async (content: string): Promise<string> => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reqtrace-junit-'));
    tempDirs.push(dir);
    const filePath = path.join(dir, 'results.xml');
    await fs.writeFile(filePath, content, 'utf8');
    return filePath;
  };

  it('maps testcase markers to outcomes', async () => {
    const filePath = await writeTemp(`<?xml version="1.0" encoding="utf-8"?>
<testsuites>
  <testsuite name="pytest" tests="5">
    <testcase classname="tests.test_pressure" name="test_boundary_high_pressure" time="0.01"/>
    <testcase classname="tests.test_pressure" name="test_boundary_low_pressure" time="0.02">
      <failure message="assert 3 &lt; 2">AssertionError</failure>
    </testcase>
    <testcase classname="tests.test_pressure" name="test_calibration[fast]">
      <skipped message="slow"/>
    </testcase>
    <testcase classname="tests.test_pressure" name="test_flaky">
      <skipped/>
      <failure/>
    </testcase>
    <testcase classname="tests.test_errors" name="test_error_path">
      <error message="boom"/>
    </testcase>
  </testsuite>
</testsuites>`);

    const result = await parseJUnitStream(filePath);

    expect(result.warnings).toEqual([]);
    expect(result.data).toEqual([
      { name: 'test_boundary_high_pressure', outcome: 'Passed', rawOutcome: 'passed', categories: [] },
      { name: 'test_boundary_low_pressure', outcome: 'Failed', rawOutcome: 'failure', categories: [] },
      { name: 'test_calibration', outcome: 'Skipped', rawOutcome: 'skipped', categories: [] },
      { name: 'test_flaky', outcome: 'Skipped', rawOutcome: 'skipped', categories: [] },
      { name: 'test_error_path', outcome: 'Failed', rawOutcome: 'error', categories: [] },
    ]);
  });

  it('collects requirement properties as categories', async () => {
    const filePath = await writeTemp(`<testsuite>
  <testcase name="test_valves">
    <properties>
      <property name="requirements" value="REQ-001, REQ-002"/>
      <property name="owner" value="REQ-009"/>
      <property name="Requirement">REQ-003</property>
    </properties>
  </testcase>
</testsuite>`);

    const result = await parseJUnitStream(filePath);

    expect(result.data).toEqual([
      { name: 'test_valves', outcome: 'Passed', rawOutcome: 'passed', categories: ['REQ-001', 'REQ-002', 'REQ-003'] },
    ]);
  });

  it('names unnamed testcases by position', async () => {
    const filePath = await writeTemp('<testsuite><testcase name="test_a"/><testcase classname="x"/></testsuite>');

    const result = await parseJUnitStream(filePath);

    expect(result.data.map((record) => record.name)).toEqual(['test_a', 'case-2']);
  });

  it('warns when a document has no testcases', async () => {
    const filePath = await writeTemp('<testsuites></testsuites>');

    const result = await importJUnitXml(filePath);

    expect(result).toEqual({
      data: [],
      warnings: [`No <testcase> elements found in ${path.resolve(filePath)}.`],
    });
  });

  it('turns malformed XML into a warning', async () => {
    const filePath = await writeTemp('<testsuite><testcase name="test_a">');

    const result = await importJUnitXml(filePath);

    expect(result.data).toEqual([]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].startsWith(`Invalid JUnit XML at ${path.resolve(filePath)}: `)).toBe(true);
  });

  it('turns a missing file into a warning', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reqtrace-junit-'));
    tempDirs.push(dir);
    const filePath = path.join(dir, 'missing.xml');

    const result = await importJUnitXml(filePath);

    expect(result.data).toEqual([]);
    expect(result.warnings[0].startsWith(`Unable to read JUnit XML at ${filePath}: `)).toBe(true);
  });

  it('strips parameter suffixes from case names', () => {
    expect(canonicalCaseName('test_limits[low-1]')).toBe('test_limits');
    expect(canonicalCaseName('CheckRange(1, 2)')).toBe('CheckRange');
    expect(canonicalCaseName(' test_plain ')).toBe('test_plain');
  });
});
