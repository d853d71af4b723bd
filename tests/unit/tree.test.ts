/**
 * Unit tests for the Tree Module
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import {
  WebsiteTree,
  averageAncestralScore,
  hostnameOf,
  isSameDomain,
  normalizeDomain,
  renderTree,
} from '../../src/tree/index.js';

const ROOT = 'https://shop.example.com/';

describe('Tree Module', () => {
  describe('hostnameOf()', () => {
    test('should lowercase and strip a trailing dot', () => {
      expect(hostnameOf('https://Shop.Example.COM./catalog')).toBe('shop.example.com');
    });

    test('should return null for non-http schemes', () => {
      expect(hostnameOf('ftp://shop.example.com/file')).toBeNull();
      expect(hostnameOf('mailto:sales@shop.example.com')).toBeNull();
    });

    test('should return null for unparseable input', () => {
      expect(hostnameOf('not a url')).toBeNull();
      expect(hostnameOf('')).toBeNull();
    });
  });

  describe('isSameDomain()', () => {
    test('should match exact hostnames regardless of case', () => {
      expect(isSameDomain('https://SHOP.example.com/p/1', 'shop.example.com')).toBe(true);
      expect(isSameDomain('http://shop.example.com:8080/p/1', 'Shop.Example.com.')).toBe(true);
    });

    test('should treat subdomains as a different scope', () => {
      expect(isSameDomain('https://blog.shop.example.com/', 'shop.example.com')).toBe(false);
      expect(isSameDomain('https://example.com/', 'shop.example.com')).toBe(false);
    });

    test('should never match an empty domain or an invalid URL', () => {
      expect(isSameDomain('https://shop.example.com/', '')).toBe(false);
      expect(isSameDomain('javascript:void(0)', 'shop.example.com')).toBe(false);
    });

    test('normalizeDomain should trim and lowercase', () => {
      expect(normalizeDomain('  Shop.Example.com. ')).toBe('shop.example.com');
    });
  });

  describe('WebsiteTree', () => {
    let tree: WebsiteTree;

    beforeEach(() => {
      tree = new WebsiteTree(ROOT);
    });

    test('should create the root with the neutral score', () => {
      expect(tree.size).toBe(1);
      expect(tree.root.ownScore).toBe(10);
      expect(tree.root.depth).toBe(0);
      expect(tree.root.state).toBe('Unexplored');
      expect(tree.domain).toBe('shop.example.com');
      expect(tree.hasVisited(ROOT)).toBe(true);
    });

    test('should reject a root URL without a crawlable host', () => {
      expect(() => new WebsiteTree('mailto:sales@shop.example.com')).toThrow(/no crawlable host/);
    });

    test('should add children with parent links and depth', () => {
      const a = tree.addChild(tree.root, { url: `${ROOT}a`, score: 8, relativePath: '/a' });
      const b = tree.addChild(a, { url: `${ROOT}a/b`, score: 6, relativePath: '/a/b' });

      expect(b.parentId).toBe(a.id);
      expect(b.depth).toBe(2);
      expect(tree.childrenOf(tree.root)).toEqual([a]);
      expect(tree.ancestorsOf(b).map((n) => n.id)).toEqual([a.id, tree.root.id]);
      expect(tree.findByUrl(`${ROOT}a/b`)).toBe(b);
    });

    test('should refuse a duplicate URL', () => {
      tree.addChild(tree.root, { url: `${ROOT}a`, score: 5 });
      expect(() => tree.addChild(tree.root, { url: `${ROOT}a`, score: 5 })).toThrow(/already exists/);
    });

    test('claim should succeed once per URL', () => {
      expect(tree.claim(`${ROOT}x`)).toBe(true);
      expect(tree.claim(`${ROOT}x`)).toBe(false);
      expect(tree.claim(ROOT)).toBe(false);
    });

    test('advance should only move forward', () => {
      expect(tree.advance(tree.root, 'Explored')).toBe(true);
      expect(tree.advance(tree.root, 'Unexplored')).toBe(false);
      expect(tree.advance(tree.root, 'Explored')).toBe(false);
      expect(tree.root.state).toBe('Explored');
    });

    describe('completion', () => {
      test('should not complete an unexplored parent when its only child completes', () => {
        const product = tree.addChild(tree.root, { url: `${ROOT}p/1`, score: 9.5, productName: 'Widget' });

        const completed = tree.markCompleteAndPropagate(product);

        expect(completed).toEqual([product]);
        expect(tree.root.state).toBe('Unexplored');
        tree.advance(tree.root, 'Explored');
        expect(tree.isCompletionSatisfied(tree.root)).toBe(true);
      });

      test('should propagate upward once every child is complete', () => {
        tree.advance(tree.root, 'Explored');
        const a = tree.addChild(tree.root, { url: `${ROOT}a`, score: 5 });
        const skipped = tree.addChild(tree.root, { url: `${ROOT}about`, score: 0.5 });

        expect(tree.markCompleteAndPropagate(skipped)).toEqual([skipped]);
        expect(tree.root.state).toBe('Explored');

        tree.advance(a, 'Explored');
        const completed = tree.markCompleteAndPropagate(a);

        expect(completed.map((n) => n.id)).toEqual([a.id, tree.root.id]);
        expect(tree.root.state).toBe('CompletelyExplored');
      });

      test('should complete an explored leaf with no children', () => {
        const a = tree.addChild(tree.root, { url: `${ROOT}a`, score: 5 });
        expect(tree.isCompletionSatisfied(a)).toBe(false);
        tree.advance(a, 'Explored');
        expect(tree.isCompletionSatisfied(a)).toBe(true);
      });

      test('should treat a low score as complete without exploring', () => {
        const low = tree.addChild(tree.root, { url: `${ROOT}login`, score: 0.99 });
        expect(tree.isCompletionSatisfied(low)).toBe(true);
      });

      test('should return nothing when the node is already complete', () => {
        const low = tree.addChild(tree.root, { url: `${ROOT}login`, score: 0 });
        tree.markCompleteAndPropagate(low);
        expect(tree.markCompleteAndPropagate(low)).toEqual([]);
      });

      test('countByState should tally every node', () => {
        tree.advance(tree.root, 'Explored');
        const low = tree.addChild(tree.root, { url: `${ROOT}login`, score: 0 });
        tree.addChild(tree.root, { url: `${ROOT}a`, score: 5 });
        tree.markCompleteAndPropagate(low);

        expect(tree.countByState()).toEqual({ Unexplored: 1, Explored: 1, CompletelyExplored: 1 });
      });
    });
  });

  describe('averageAncestralScore()', () => {
    test('should average own score with non-root ancestors', () => {
      const tree = new WebsiteTree(ROOT);
      const a = tree.addChild(tree.root, { url: `${ROOT}a`, score: 8 });
      const b = tree.addChild(a, { url: `${ROOT}a/b`, score: 6 });
      const c = tree.addChild(b, { url: `${ROOT}a/b/c`, score: 4 });

      expect(averageAncestralScore(tree, c)).toBe(6);
      expect(averageAncestralScore(tree, b)).toBe(7);
      expect(averageAncestralScore(tree, a)).toBe(8);
    });

    test('should return the root score for the root', () => {
      const tree = new WebsiteTree(ROOT);
      expect(averageAncestralScore(tree, tree.root)).toBe(10);
    });
  });

  describe('renderTree()', () => {
    test('should draw states, paths, child counts and product names', () => {
      const tree = new WebsiteTree(ROOT);
      tree.advance(tree.root, 'Explored');
      const a = tree.addChild(tree.root, { url: `${ROOT}a`, score: 5, relativePath: '/a' });
      tree.addChild(a, { url: `${ROOT}a/b`, score: 4, relativePath: '/a/b' });
      const product = tree.addChild(tree.root, {
        url: `${ROOT}w`,
        score: 9.5,
        relativePath: '/w',
        productName: 'Widget',
      });
      tree.markCompleteAndPropagate(product);

      expect(renderTree(tree).split('\n')).toEqual([
        '◐ https://shop.example.com/ [1/2]',
        '├── ○ /a [0/1]',
        '│   └── ○ /a/b [0/0]',
        '└── ✓ /w [0/0] "Widget"',
      ]);
    });
  });
});
