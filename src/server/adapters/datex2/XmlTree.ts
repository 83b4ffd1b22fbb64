/**
 * Namespace-aware, read-only XML element tree plus the small set of queries
 * the DATEX2 extractor needs. Every lookup is keyed by namespace URI and
 * local name; prefixes play no part in matching.
 */

import type { QualifiedName } from './namespaces.js';

export interface XmlAttribute {
  /** Qualified name as written in the document, e.g. `xsi:type` */
  readonly name: string;
  readonly localName: string;
  /** Empty string for unprefixed attributes */
  readonly namespaceUri: string;
  readonly value: string;
}

export interface XmlElement {
  /** Empty string for elements in no namespace */
  readonly namespaceUri: string;
  readonly localName: string;
  readonly attributes: readonly XmlAttribute[];
  /** Character data before the first child element; undefined when there is none */
  readonly text: string | undefined;
  /** Child elements in document order */
  readonly children: readonly XmlElement[];
}

export function matches(element: XmlElement, name: QualifiedName): boolean {
  return element.localName === name.localName && element.namespaceUri === name.namespaceUri;
}

/**
 * First direct child with the given name
 */
export function findChild(element: XmlElement, name: QualifiedName): XmlElement | undefined {
  return element.children.find(child => matches(child, name));
}

/**
 * Depth-first, document-order walk over every element strictly beneath `element`.
 * Uses an explicit worklist so deep documents cannot exhaust the call stack.
 */
export function* descendants(element: XmlElement): Generator<XmlElement> {
  const stack: XmlElement[] = [...element.children].reverse();

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) {
      break;
    }
    yield current;
    for (let i = current.children.length - 1; i >= 0; i--) {
      stack.push(current.children[i]);
    }
  }
}

/**
 * First element anywhere beneath `element` with the given name, in document order
 */
export function findDescendant(element: XmlElement, name: QualifiedName): XmlElement | undefined {
  for (const candidate of descendants(element)) {
    if (matches(candidate, name)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Every element anywhere beneath `element` with the given name, in document order.
 * Matches nested inside other matches are included.
 */
export function findAllDescendants(element: XmlElement, name: QualifiedName): XmlElement[] {
  const found: XmlElement[] = [];
  for (const candidate of descendants(element)) {
    if (matches(candidate, name)) {
      found.push(candidate);
    }
  }
  return found;
}

/**
 * Attribute value by local name and namespace (no namespace by default)
 */
export function getAttribute(
  element: XmlElement,
  localName: string,
  namespaceUri: string = ''
): string | undefined {
  return element.attributes.find(
    attribute => attribute.localName === localName && attribute.namespaceUri === namespaceUri
  )?.value;
}
