import { describe, it, expect } from 'vitest';
import {
  descendants,
  findAllDescendants,
  findChild,
  findDescendant,
  getAttribute,
  matches,
} from './XmlTree.js';
import type { XmlAttribute, XmlElement } from './XmlTree.js';

const NS_A = 'urn:test:a';
const NS_B = 'urn:test:b';

function el(
  namespaceUri: string,
  localName: string,
  children: XmlElement[] = [],
  text?: string,
  attributes: XmlAttribute[] = []
): XmlElement {
  return { namespaceUri, localName, attributes, text, children };
}

describe('XmlTree', () => {
  // root
  // ├── item#1
  // │   └── item#2
  // ├── other
  // │   └── item#3
  // └── item#4 (namespace B)
  const item2 = el(NS_A, 'item', [], 'two');
  const item1 = el(NS_A, 'item', [item2], 'one');
  const item3 = el(NS_A, 'item', [], 'three');
  const other = el(NS_A, 'other', [item3]);
  const item4 = el(NS_B, 'item', [], 'four');
  const root = el(NS_A, 'root', [item1, other, item4]);

  describe('matches', () => {
    it('requires both namespace and local name to match', () => {
      expect(matches(item1, { namespaceUri: NS_A, localName: 'item' })).toBe(true);
      expect(matches(item4, { namespaceUri: NS_A, localName: 'item' })).toBe(false);
      expect(matches(item1, { namespaceUri: NS_A, localName: 'other' })).toBe(false);
    });
  });

  describe('findChild', () => {
    it('only looks at direct children', () => {
      expect(findChild(root, { namespaceUri: NS_A, localName: 'item' })).toBe(item1);
      expect(findChild(other, { namespaceUri: NS_A, localName: 'item' })).toBe(item3);
      expect(findChild(item2, { namespaceUri: NS_A, localName: 'item' })).toBeUndefined();
    });
  });

  describe('descendants', () => {
    it('walks depth-first in document order and excludes the start element', () => {
      const texts = Array.from(descendants(root), node => node.text ?? node.localName);
      expect(texts).toEqual(['one', 'two', 'other', 'three', 'four']);
    });

    it('yields nothing for a leaf', () => {
      expect(Array.from(descendants(item3))).toEqual([]);
    });

    it('handles very deep nesting', () => {
      let deep = el(NS_A, 'leaf', [], 'bottom');
      for (let i = 0; i < 50000; i++) {
        deep = el(NS_A, 'level', [deep]);
      }
      expect(findDescendant(deep, { namespaceUri: NS_A, localName: 'leaf' })?.text).toBe('bottom');
    });
  });

  describe('findDescendant', () => {
    it('returns the first match in document order', () => {
      expect(findDescendant(root, { namespaceUri: NS_A, localName: 'item' })).toBe(item1);
    });

    it('distinguishes namespaces', () => {
      expect(findDescendant(root, { namespaceUri: NS_B, localName: 'item' })).toBe(item4);
      expect(findDescendant(root, { namespaceUri: 'urn:test:c', localName: 'item' })).toBeUndefined();
    });
  });

  describe('findAllDescendants', () => {
    it('includes matches nested inside other matches', () => {
      const found = findAllDescendants(root, { namespaceUri: NS_A, localName: 'item' });
      expect(found).toEqual([item1, item2, item3]);
    });
  });

  describe('getAttribute', () => {
    const withAttributes = el(NS_A, 'situation', [], undefined, [
      { name: 'id', localName: 'id', namespaceUri: '', value: 'S-1' },
      {
        name: 'xsi:type',
        localName: 'type',
        namespaceUri: 'http://www.w3.org/2001/XMLSchema-instance',
        value: 'sit:Situation',
      },
    ]);

    it('reads unprefixed attributes by default', () => {
      expect(getAttribute(withAttributes, 'id')).toBe('S-1');
      expect(getAttribute(withAttributes, 'type')).toBeUndefined();
    });

    it('reads namespaced attributes by URI', () => {
      expect(getAttribute(withAttributes, 'type', 'http://www.w3.org/2001/XMLSchema-instance')).toBe('sit:Situation');
    });

    it('returns undefined for missing attributes', () => {
      expect(getAttribute(withAttributes, 'version')).toBeUndefined();
    });
  });
});
