/**
 * Tree walker
 *
 * Produces the diagram of one module as a lazy sequence of lines, in this
 * order: module header, top-level data nodes, augmentation groups, RPCs,
 * notifications. Module lookup happens when the sequence is created, so a
 * missing module fails before any line is produced.
 */

import type { Logger } from '@yangtree/shared';

import type { Module, SchemaContext } from '../model/schema-context.js';
import { buildSchemaTree, SchemaTree } from '../model/schema-tree.js';
import { NotFoundError } from '../types/errors.js';
import {
  effectiveDepth,
  effectiveLineLength,
  resolveTreeOptions,
  type ResolvedTreeOptions,
  type TreeOptions,
} from '../types/options.js';
import { augmentHeader, groupAugmentations } from './augmentations.js';
import { ConnectorTracker } from './connectors.js';
import { TREE_HELP } from './help.js';
import {
  hasTypeColumn,
  labelOf,
  renderLine,
  truncate,
  type KeyScope,
  type LineEnvironment,
  type RenderContext,
  type Role,
} from './line.js';
import { buildNamespacePrefixMap } from './prefixes.js';
import { SuppressionSet } from './suppression.js';

/** A module to print, optionally pinned to a revision */
export interface ModuleSource {
  readonly name: string;
  readonly revision?: string;
}

export interface RenderDependencies {
  /** Prebuilt schema tree, shared across modules of one context */
  tree?: SchemaTree;
  logger?: Logger;
}

export class TreeWalker {
  readonly #connectors = new ConnectorTracker();
  readonly #suppressed = new SuppressionSet();
  readonly #env: LineEnvironment;
  readonly #lineLength: number;
  #depth: number;

  constructor(
    context: SchemaContext,
    private readonly tree: SchemaTree,
    private readonly module: Module,
    options: ResolvedTreeOptions
  ) {
    this.#env = {
      module,
      prefixes: buildNamespacePrefixMap(context, module, options),
      suppressed: this.#suppressed,
    };
    this.#depth = effectiveDepth(options);
    this.#lineLength = effectiveLineLength(options);
  }

  *lines(): Generator<string> {
    yield this.#emit(`module: ${this.module.name}`);

    const roots = this.#ownChildren([...this.tree.children.values()]).filter(
      (child) => !child.augmenting
    );
    yield* this.#entries(roots);

    for (const group of groupAugmentations(this.tree, this.module)) {
      yield this.#emit(augmentHeader(group.target, this.#env.prefixes));
      yield* this.#entries(group.members, group.role);
    }

    if (this.module.rpcs.length > 0) {
      yield this.#emit('RPCs:');
      yield* this.#entries(this.module.rpcs.map((rpc) => SchemaTree.of(rpc)));
    }

    if (this.module.notifications.length > 0) {
      yield this.#emit('notifications:');
      yield* this.#entries(
        this.module.notifications.map((n) => SchemaTree.of(n))
      );
    }
  }

  /** Remaining depth budget; equals the configured budget between entries */
  get remainingDepth(): number {
    return this.#depth;
  }

  /**
   * Entry points start at the left margin with a full depth budget, and
   * have no ancestors in the connector stack. Augmentations of an input or
   * output pass that role down to their members.
   */
  *#entries(
    entries: readonly SchemaTree[],
    role: Role = 'plain'
  ): Generator<string> {
    yield* this.#siblings(entries, role, null);
  }

  *#siblings(
    siblings: readonly SchemaTree[],
    role: Role,
    keys: KeyScope | null
  ): Generator<string> {
    const items = siblings.flatMap((tree) => {
      if (tree.node === null) return [];
      const context: RenderContext = {
        node: tree.node,
        connectors: this.#connectors.snapshot(),
        role: roleOf(tree, role),
        keys,
        depth: this.#depth,
      };
      return [{ tree, context }];
    });
    const typeColumn = items.reduce(
      (width, { context }) =>
        hasTypeColumn(context.node)
          ? Math.max(width, labelOf(context, this.#env).length)
          : width,
      0
    );

    for (const [index, { tree, context }] of items.entries()) {
      const hasMore = index < items.length - 1;
      const line = renderLine(context, this.#env, typeColumn).toString();

      if (context.node.kind === 'case') {
        const release = this.#suppressed.acquire(tree.path.length - 1);
        try {
          yield this.#emit(line);
          yield* this.#descend(tree, hasMore, context);
        } finally {
          release();
        }
      } else {
        yield this.#emit(line);
        yield* this.#descend(tree, hasMore, context);
      }
    }
  }

  /**
   * Children of `tree`, one level deeper. Costs one unit of the budget the
   * line was drawn with and always gives it back, so siblings see the same
   * budget.
   */
  *#descend(
    tree: SchemaTree,
    hasMore: boolean,
    context: RenderContext
  ): Generator<string> {
    this.#depth = context.depth - 1;
    try {
      if (this.#depth <= 0) return;
      this.#connectors.push(hasMore);
      try {
        yield* this.#children(tree, context.role, context.keys);
      } finally {
        this.#connectors.pop();
      }
    } finally {
      this.#depth = context.depth;
    }
  }

  *#children(
    tree: SchemaTree,
    role: Role,
    inherited: KeyScope | null
  ): Generator<string> {
    const { node } = tree;
    if (node === null) return;

    switch (node.kind) {
      case 'choice': {
        const release = this.#suppressed.acquire(tree.path.length - 1);
        try {
          yield* this.#siblings(
            this.#ownChildren(tree.dataChildren),
            role,
            inherited
          );
        } finally {
          release();
        }
        return;
      }
      case 'case':
        yield* this.#siblings(
          this.#ownChildren(tree.dataChildren),
          role,
          inherited
        );
        return;
      case 'list':
        yield* this.#siblings(this.#ownSiblings(tree), role, {
          listPath: tree.path,
          keys: node.keys,
        });
        return;
      case 'rpc':
      case 'action':
        yield* this.#siblings(
          tree.dataChildren.filter(
            (body) => this.#ownChildren(body.dataChildren).length > 0
          ),
          role,
          null
        );
        return;
      case 'container':
      case 'input':
      case 'output':
      case 'notification':
        yield* this.#siblings(this.#ownSiblings(tree), role, null);
        return;
      default:
        return;
    }
  }

  /** Data children first, then actions, both limited to the printed module */
  #ownSiblings(tree: SchemaTree): SchemaTree[] {
    return this.#ownChildren([...tree.dataChildren, ...tree.actionChildren]);
  }

  #ownChildren(children: readonly SchemaTree[]): SchemaTree[] {
    return children.filter(
      (child) => child.namespace === this.module.namespace
    );
  }

  #emit(text: string): string {
    return truncate(text, this.#lineLength);
  }
}

function roleOf(tree: SchemaTree, inherited: Role): Role {
  switch (tree.node?.kind) {
    case 'input':
      return 'rpc-input';
    case 'output':
      return 'rpc-output';
    default:
      return inherited;
  }
}

/**
 * Lines of one module's diagram. Throws NotFoundError right away when the
 * module (or the requested revision) is not in the context.
 */
export function renderModuleTree(
  context: SchemaContext,
  source: ModuleSource,
  options: TreeOptions = {},
  deps: RenderDependencies = {}
): Iterable<string> {
  const resolved = resolveTreeOptions(options);
  const module = context.findModule(source.name, source.revision);
  if (module === undefined) {
    const label =
      source.revision === undefined
        ? source.name
        : `${source.name}@${source.revision}`;
    throw new NotFoundError('Module', label, {
      module: source.name,
      revision: source.revision,
    });
  }

  deps.logger?.debug(`rendering module ${module.name}`, {
    revision: module.revision,
    depth: resolved.depth,
    lineLength: resolved.lineLength,
  });
  const tree = deps.tree ?? buildSchemaTree(context);
  return new TreeWalker(context, tree, module, resolved).lines();
}

/** The symbol legend, clipped to the configured line length */
export function renderHelp(options: TreeOptions = {}): string[] {
  const width = effectiveLineLength(resolveTreeOptions(options));
  return TREE_HELP.map((line) => truncate(line, width));
}

export interface RenderTreesDependencies extends RenderDependencies {
  /** Called for each module that is not found; it is then skipped */
  onNotFound?: (error: NotFoundError) => void;
}

/**
 * The legend (when `help` is set) followed by the diagram of each module in
 * the order given. A module that is not found is reported through
 * `onNotFound` (or logged as a warning) and the rest still render.
 */
export function renderTrees(
  context: SchemaContext,
  sources: readonly ModuleSource[],
  options: TreeOptions = {},
  deps: RenderTreesDependencies = {}
): Iterable<string> {
  const resolved = resolveTreeOptions(options);
  const tree = deps.tree ?? buildSchemaTree(context);
  return treeLines(context, sources, resolved, { ...deps, tree });
}

function* treeLines(
  context: SchemaContext,
  sources: readonly ModuleSource[],
  options: ResolvedTreeOptions,
  deps: RenderTreesDependencies
): Generator<string> {
  if (options.help) {
    yield* renderHelp(options);
  }
  for (const source of sources) {
    let lines: Iterable<string>;
    try {
      lines = renderModuleTree(context, source, options, deps);
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      if (deps.onNotFound !== undefined) {
        deps.onNotFound(error);
      } else {
        deps.logger?.warn(error.message, {
          module: source.name,
          revision: source.revision,
        });
      }
      continue;
    }
    yield* lines;
  }
}
