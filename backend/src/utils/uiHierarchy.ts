/**
 * uiautomator hierarchy parsing
 *
 * Turns the XML written by `uiautomator dump` into a linked {@link UiTreeNode}
 * tree. Attribute names follow the dump format (`resource-id`, `content-desc`,
 * `bounds="[l,t][r,b]"`).
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { Bounds, UiTreeNode } from '../types/uiTree';
import { UiDumpError } from './errors';

const BOUNDS_PATTERN = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;

const ZERO_BOUNDS: Bounds = { left: 0, top: 0, right: 0, bottom: 0 };

type XmlRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is XmlRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  isArray: name => name === 'node'
});

export function parseBounds(value: string | null | undefined): Bounds {
  if (!value) {
    return { ...ZERO_BOUNDS };
  }
  const match = BOUNDS_PATTERN.exec(value.trim());
  if (!match) {
    return { ...ZERO_BOUNDS };
  }
  return {
    left: Number(match[1]),
    top: Number(match[2]),
    right: Number(match[3]),
    bottom: Number(match[4])
  };
}

const attribute = (element: XmlRecord, name: string): string | null => {
  const value = element[`@_${name}`];
  if (value === undefined || value === null) return null;
  const text = String(value);
  return text.length > 0 ? text : null;
};

const flagAttribute = (element: XmlRecord, name: string, fallback: boolean): boolean => {
  const value = attribute(element, name);
  return value === null ? fallback : value === 'true';
};

const childElements = (element: XmlRecord): XmlRecord[] => {
  const nodes = element.node;
  if (!Array.isArray(nodes)) return [];
  return nodes.filter(isRecord);
};

function toTreeNode(element: XmlRecord, parent: UiTreeNode | null): UiTreeNode {
  const node: UiTreeNode = {
    className: attribute(element, 'class'),
    text: attribute(element, 'text'),
    contentDescription: attribute(element, 'content-desc'),
    resourceId: attribute(element, 'resource-id'),
    packageName: attribute(element, 'package'),
    clickable: flagAttribute(element, 'clickable', false),
    enabled: flagAttribute(element, 'enabled', true),
    focusable: flagAttribute(element, 'focusable', false),
    longClickable: flagAttribute(element, 'long-clickable', false),
    visible: flagAttribute(element, 'visible-to-user', true),
    bounds: parseBounds(attribute(element, 'bounds')),
    children: [],
    parent
  };

  node.children = childElements(element).map(child => toTreeNode(child, node));
  return node;
}

/**
 * Parse a uiautomator dump.
 *
 * Returns null when the document holds no nodes (no active window). A dump
 * with several top-level windows is wrapped in a synthetic `hierarchy` root.
 *
 * @throws UiDumpError when the document is not well-formed XML
 */
export function parseUiHierarchy(xml: string): UiTreeNode | null {
  const trimmed = xml.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const validation = XMLValidator.validate(trimmed);
  if (validation !== true) {
    throw new UiDumpError('UI dump is not well-formed XML', {
      reason: validation.err.msg,
      line: validation.err.line
    });
  }

  const document: unknown = parser.parse(trimmed);
  if (!isRecord(document)) {
    return null;
  }

  const container = isRecord(document.hierarchy) ? document.hierarchy : document;
  const topLevel = childElements(container);

  if (topLevel.length === 0) {
    return null;
  }

  if (topLevel.length === 1) {
    return toTreeNode(topLevel[0], null);
  }

  const root: UiTreeNode = {
    className: 'hierarchy',
    text: null,
    contentDescription: null,
    resourceId: null,
    packageName: null,
    clickable: false,
    enabled: true,
    focusable: false,
    longClickable: false,
    visible: true,
    bounds: { ...ZERO_BOUNDS },
    children: [],
    parent: null
  };
  root.children = topLevel.map(element => toTreeNode(element, root));
  return root;
}

/**
 * Depth-first walk, parents before children
 */
export function* walkTree(root: UiTreeNode): Generator<UiTreeNode> {
  yield root;
  for (const child of root.children) {
    yield* walkTree(child);
  }
}
