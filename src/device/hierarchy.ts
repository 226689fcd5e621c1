import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { Bounds, RawElementRecord } from "../core/types.js";
import { DeviceError } from "../utils/errors.js";

const MIN_CLICKABLE_SIZE = 10;
const BOUNDS_PATTERN = /\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]/;

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  isArray: (name) => name === "node",
});

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function attr(node: XmlNode, name: string): string {
  const value = node[name];
  return typeof value === "string" ? value.trim() : "";
}

function flag(node: XmlNode, name: string) {
  return attr(node, name) === "true";
}

function childNodes(node: XmlNode): XmlNode[] {
  const children = node.node;
  return Array.isArray(children) ? children.filter(isXmlNode) : [];
}

export function parseBounds(raw: string): Bounds | null {
  const match = BOUNDS_PATTERN.exec(raw);
  if (!match) return null;
  const [left, top, right, bottom] = match.slice(1, 5).map(Number);
  if (left === undefined || top === undefined || right === undefined || bottom === undefined) {
    return null;
  }
  return { left, top, right, bottom };
}

function toRecord(node: XmlNode): RawElementRecord | null {
  const bounds = parseBounds(attr(node, "bounds"));
  if (!bounds) return null;
  const width = bounds.right - bounds.left;
  const height = bounds.bottom - bounds.top;
  if (width <= 0 || height <= 0) return null;

  const text = attr(node, "text");
  const label = attr(node, "content-desc");
  const resourceId = attr(node, "resource-id");
  const className = attr(node, "class");
  const clickable = flag(node, "clickable");
  const isInput = className.includes("EditText");

  const hasIdentity = text !== "" || label !== "" || resourceId !== "";
  const usableTarget = clickable && width > MIN_CLICKABLE_SIZE && height > MIN_CLICKABLE_SIZE;
  if (!hasIdentity && !usableTarget && !isInput) return null;

  return {
    text,
    label,
    className,
    resourceId,
    packageName: attr(node, "package"),
    hint: attr(node, "hint"),
    bounds,
    clickable,
    scrollable: flag(node, "scrollable"),
    enabled: attr(node, "enabled") !== "false",
  };
}

/**
 * Flattens a `uiautomator dump` document into element records in document
 * order. Layout-only containers are dropped.
 */
export function parseHierarchyXml(xml: string): RawElementRecord[] {
  const start = xml.indexOf("<?xml") !== -1 ? xml.indexOf("<?xml") : xml.indexOf("<hierarchy");
  if (start === -1) {
    throw new DeviceError("UI hierarchy dump did not return XML");
  }
  const document = xml.slice(start).trim();
  const valid = XMLValidator.validate(document);
  if (valid !== true) {
    throw new DeviceError(`Malformed UI hierarchy XML: ${valid.err.msg} (line ${valid.err.line})`);
  }

  const root: unknown = parser.parse(document);
  const hierarchy = isXmlNode(root) ? root.hierarchy : undefined;
  if (!isXmlNode(hierarchy)) return [];

  const records: RawElementRecord[] = [];
  const stack = childNodes(hierarchy).reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    const record = toRecord(node);
    if (record) records.push(record);
    stack.push(...childNodes(node).reverse());
  }
  return records;
}
