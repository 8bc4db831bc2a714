import { XMLParser, XMLValidator } from "fast-xml-parser";
import { FeedError } from "./errors.js";

/**
 * Element tree decoded from XML in document order. Namespace prefixes are stripped from names;
 * attributes, comments and processing instructions are dropped.
 */
export interface XmlElement {
  name: string;
  text: string;
  children: XmlElement[];
}

const TEXT_NODE = "#text";
const ATTRIBUTES_NODE = ":@";

function createFeedXmlParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    removeNSPrefix: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    // Keep values as text; numeric-looking ids and GTINs must keep their leading zeros
    parseTagValue: false,
    trimValues: true,
  });
}

const toElements = (nodes: unknown): XmlElement[] => {
  if (!Array.isArray(nodes)) return [];
  const list: unknown[] = nodes;
  const out: XmlElement[] = [];
  for (const node of list) {
    if (typeof node !== "object" || node === null) continue;
    const entries: [string, unknown][] = Object.entries(node);
    for (const [name, body] of entries) {
      if (name === TEXT_NODE || name === ATTRIBUTES_NODE) continue;
      out.push({ name, text: collectText(body), children: toElements(body) });
    }
  }
  return out;
};

const collectText = (nodes: unknown): string => {
  if (!Array.isArray(nodes)) return "";
  const list: unknown[] = nodes;
  let text = "";
  for (const node of list) {
    if (typeof node !== "object" || node === null) continue;
    const entries: [string, unknown][] = Object.entries(node);
    for (const [name, value] of entries) {
      if (name !== TEXT_NODE) continue;
      if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        text += String(value);
      }
    }
  }
  return text;
};

/**
 * Parse an XML document and return its root element.
 * @throws FeedError PARSE_ERROR when the document is not well-formed
 */
export function parseXmlDocument(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new FeedError("PARSE_ERROR", `Invalid XML: ${msg} (line ${line}, column ${col})`, { line, col });
  }
  const roots = toElements(createFeedXmlParser().parse(xml));
  if (roots.length === 0) {
    throw new FeedError("PARSE_ERROR", "Invalid XML: document has no root element");
  }
  return roots[0];
}

/** Descendants of `root` (excluding `root`) with the given name, in document order. */
export function findDescendants(root: XmlElement, name: string): XmlElement[] {
  const out: XmlElement[] = [];
  const visit = (el: XmlElement): void => {
    for (const child of el.children) {
      if (child.name === name) out.push(child);
      visit(child);
    }
  };
  visit(root);
  return out;
}
