import type { SchemaContext } from './schema-context.js';
import {
  childNodes,
  pathKey,
  type QName,
  type SchemaNode,
} from './schema-node.js';

/**
 * A schema node together with its absolute path and its children, keyed by
 * path in document order.
 *
 * The root tree (no node) holds every module's top-level data nodes and, for
 * each augmentation, every augmenting node keyed by its full path.
 */
export class SchemaTree {
  readonly children = new Map<string, SchemaTree>();

  constructor(
    readonly node: SchemaNode | null,
    readonly path: readonly QName[],
    readonly augmenting: boolean
  ) {}

  /** Build the subtree rooted at a schema node */
  static of(node: SchemaNode): SchemaTree {
    const tree = new SchemaTree(node, node.path, node.augmenting);
    for (const child of childNodes(node)) {
      tree.add(SchemaTree.of(child));
    }
    return tree;
  }

  add(child: SchemaTree): void {
    this.children.set(pathKey(child.path), child);
  }

  /** Children that are not actions: data nodes, cases, input and output */
  get dataChildren(): SchemaTree[] {
    return [...this.children.values()].filter(
      (child) => child.node !== null && child.node.kind !== 'action'
    );
  }

  /** Actions defined on this node, including ones added by augmentation */
  get actionChildren(): SchemaTree[] {
    return [...this.children.values()].filter(
      (child) => child.node?.kind === 'action'
    );
  }

  /** Namespace of the last path segment */
  get namespace(): string | undefined {
    return this.path[this.path.length - 1]?.namespace;
  }
}

export function buildSchemaTree(context: SchemaContext): SchemaTree {
  const root = new SchemaTree(null, [], false);
  for (const module of context.modules) {
    for (const node of module.dataNodes) {
      root.add(SchemaTree.of(node));
    }
  }
  for (const module of context.modules) {
    for (const augment of module.augments) {
      for (const node of augment.nodes) {
        root.add(SchemaTree.of(node));
      }
    }
  }
  return root;
}
