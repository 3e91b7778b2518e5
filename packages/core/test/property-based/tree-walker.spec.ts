/**
 * Property-based tests for the tree walker over generated container/leaf
 * hierarchies.
 */

import fc from 'fast-check';
import { describe, it, expect } from 'vitest';

import {
  loadSchemaDocument,
  renderModuleTree,
  type RawSchemaDocument,
  type TreeOptions,
} from '../../src/index.js';

/** Fixed seed for deterministic testing */
const TREE_TEST_SEED = 424242;
const numRuns = Number(process.env.FC_NUM_RUNS ?? '100');

type GenNode =
  | { kind: 'leaf'; name: string; type: string }
  | { kind: 'container'; name: string; children: GenNode[] };

const nameArb = fc.stringMatching(/^[a-z][a-z0-9]{0,5}$/);

function nodeArb(depth: number): fc.Arbitrary<GenNode> {
  const leaf: fc.Arbitrary<GenNode> = fc.record({
    kind: fc.constant('leaf' as const),
    name: nameArb,
    type: fc.constantFrom('string', 'uint8', 'boolean'),
  });
  if (depth === 0) return leaf;
  const container: fc.Arbitrary<GenNode> = fc.record({
    kind: fc.constant('container' as const),
    name: nameArb,
    children: siblingsArb(depth - 1),
  });
  return fc.oneof(leaf, container);
}

function siblingsArb(depth: number): fc.Arbitrary<GenNode[]> {
  return fc.uniqueArray(nodeArb(depth), {
    maxLength: 3,
    selector: (node) => node.name,
  });
}

/** Nodes printed when `levels` levels are allowed */
function countNodes(nodes: readonly GenNode[], levels: number): number {
  return nodes.reduce(
    (sum, node) =>
      sum +
      1 +
      (node.kind === 'container' && levels > 1
        ? countNodes(node.children, levels - 1)
        : 0),
    0
  );
}

function render(roots: GenNode[], options: TreeOptions = {}): string[] {
  const document: RawSchemaDocument = {
    modules: [
      { name: 'gen', prefix: 'g', namespace: 'urn:example:gen', data: roots },
    ],
  };
  const context = loadSchemaDocument(document).unwrap();
  return [...renderModuleTree(context, { name: 'gen' }, options)];
}

describe('TreeWalker properties', () => {
  it('prints one line per node plus the module header', () => {
    fc.assert(
      fc.property(siblingsArb(3), (roots) => {
        const lines = render(roots);
        expect(lines[0]).toBe('module: gen');
        expect(lines).toHaveLength(1 + countNodes(roots, Infinity));
      }),
      { seed: TREE_TEST_SEED, numRuns }
    );
  });

  it('prints exactly the nodes within the depth limit', () => {
    fc.assert(
      fc.property(
        siblingsArb(3),
        fc.integer({ min: 1, max: 5 }),
        (roots, depth) => {
          expect(render(roots, { depth })).toHaveLength(
            1 + countNodes(roots, depth)
          );
        }
      ),
      { seed: TREE_TEST_SEED, numRuns }
    );
  });

  it('truncation only clips lines of the full rendering', () => {
    fc.assert(
      fc.property(
        siblingsArb(3),
        fc.integer({ min: 1, max: 30 }),
        (roots, lineLength) => {
          const full = render(roots);
          const clipped = render(roots, { lineLength });
          expect(clipped).toEqual(
            full.map((line) => line.slice(0, lineLength))
          );
        }
      ),
      { seed: TREE_TEST_SEED, numRuns }
    );
  });

  it('every vertical bar continues down to a later sibling', () => {
    fc.assert(
      fc.property(siblingsArb(3), (roots) => {
        const lines = render(roots).slice(1);
        lines.forEach((line, i) => {
          for (let column = 2; column < line.length; column += 3) {
            if (line[column] !== '|') continue;
            const below = lines[i + 1]?.[column];
            expect(below === '|' || below === '+').toBe(true);
          }
        });
      }),
      { seed: TREE_TEST_SEED, numRuns }
    );
  });

  it('rendering is deterministic', () => {
    fc.assert(
      fc.property(siblingsArb(3), (roots) => {
        expect(render(roots)).toEqual(render(roots));
      }),
      { seed: TREE_TEST_SEED, numRuns }
    );
  });
});
