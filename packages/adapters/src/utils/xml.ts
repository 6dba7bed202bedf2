import { XMLParser, XMLValidator } from 'fast-xml-parser';

export const ATTRIBUTE_PREFIX = '@_';
export const TEXT_NODE = '#text';

export type XmlElement = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  removeNSPrefix: true,
  allowBooleanAttributes: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
});

export class XmlSyntaxError extends Error {
  public readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = 'XmlSyntaxError';
    this.line = line;
  }
}

/** Validates first: fast-xml-parser alone accepts a lot of broken markup. */
export const parseXml = (content: string): XmlElement => {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    throw new XmlSyntaxError(validation.err.msg, validation.err.line);
  }
  const parsed: unknown = parser.parse(content);
  return isXmlElement(parsed) ? parsed : {};
};

export const isXmlElement = (value: unknown): value is XmlElement =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** `t:UnitTest` and `UnitTest` both resolve to `UnitTest`. */
export const localName = (name: string): string => {
  const separator = name.lastIndexOf(':');
  return separator === -1 ? name : name.slice(separator + 1);
};

const isChildKey = (key: string): boolean => !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_NODE;

const asElements = (value: unknown): XmlElement[] => {
  const items = Array.isArray(value) ? value : [value];
  return items.map((item) => {
    if (isXmlElement(item)) {
      return item;
    }
    // Elements without attributes or children collapse to their text.
    return item === undefined || item === null || item === '' ? {} : { [TEXT_NODE]: String(item) };
  });
};

/** Every descendant element with the given local name, in document order. */
export const findElements = (root: XmlElement, name: string): XmlElement[] => {
  const found: XmlElement[] = [];
  const visit = (element: XmlElement) => {
    Object.entries(element).forEach(([key, value]) => {
      if (!isChildKey(key)) {
        return;
      }
      asElements(value).forEach((child) => {
        if (localName(key) === name) {
          found.push(child);
        }
        visit(child);
      });
    });
  };
  visit(root);
  return found;
};

export const hasElement = (root: XmlElement, name: string): boolean => findElements(root, name).length > 0;

/**
 * Reads an attribute from a fast-xml-parser element or a SAX attribute map.
 * SAX parsers in namespace mode wrap values as `{ value }`.
 */
export const attributeText = (attributes: Record<string, unknown>, name: string): string | undefined => {
  const raw = attributes[`${ATTRIBUTE_PREFIX}${name}`] ?? attributes[name];
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (isXmlElement(raw)) {
    return typeof raw.value === 'string' ? raw.value : undefined;
  }
  return typeof raw === 'string' ? raw : String(raw);
};

export const elementText = (element: XmlElement): string | undefined => {
  const text = element[TEXT_NODE];
  if (text === undefined || text === null) {
    return undefined;
  }
  const value = String(text).trim();
  return value.length > 0 ? value : undefined;
};
