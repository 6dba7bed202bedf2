export * from './types';
export { importJUnitXml } from './junitXml';
export { canonicalCaseName, parseJUnitStream } from './adapters/junit';
export { importTrx, parseTrx } from './trx';
export {
  describeScanResult,
  mergeScanResults,
  recordAssociation,
  recordAssociations,
  toRequirementMap,
} from './scanners/associations';
export { TEST_DESIGNATORS, attributeNames, findClosingBrace, isTestAttributeBlock, scanCSharpSource } from './scanners/csharp';
export { scanDocstrings, scanMarkers, scanNames, scanProximity, scanPythonSource } from './scanners/python';
export { scanCSharpSources, scanPythonSources } from './scanners/sources';
export { SALVAGE_PATTERNS, salvageRequirementIds, type SalvageOptions } from './salvage';
export { decodeText } from './utils/text';
export { discoverFiles, relativeTo } from './utils/discovery';
export { XmlSyntaxError, parseXml } from './utils/xml';
