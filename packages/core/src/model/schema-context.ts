import type {
  ActionNode,
  CaseNode,
  DataNode,
  NotificationNode,
  QName,
  RpcNode,
} from './schema-node.js';

export interface Augmentation {
  /** Target schema node identifier as written, e.g. '/if:interfaces/if:interface' */
  readonly targetText: string;
  readonly target: readonly QName[];
  /** Set when the target is, or lies inside, an operation's input or output */
  readonly operationBody: 'input' | 'output' | null;
  readonly nodes: ReadonlyArray<DataNode | CaseNode | ActionNode>;
}

export interface Module {
  readonly name: string;
  readonly prefix: string;
  readonly namespace: string;
  readonly revision?: string;
  /** Import prefix to module name; the module's own prefix is included */
  readonly imports: ReadonlyMap<string, string>;
  readonly features: readonly string[];
  readonly dataNodes: readonly DataNode[];
  readonly rpcs: readonly RpcNode[];
  readonly notifications: readonly NotificationNode[];
  readonly augments: readonly Augmentation[];
}

/**
 * The set of modules a schema document describes
 */
export class SchemaContext {
  readonly #modules: readonly Module[];

  constructor(modules: readonly Module[]) {
    this.#modules = modules;
  }

  get modules(): readonly Module[] {
    return this.#modules;
  }

  /**
   * Find a module by name; with a revision only that revision matches,
   * without one the latest revision wins.
   */
  findModule(name: string, revision?: string): Module | undefined {
    const candidates = this.#modules.filter((m) => m.name === name);
    if (revision !== undefined) {
      return candidates.find((m) => m.revision === revision);
    }
    return candidates.reduce<Module | undefined>(
      (latest, m) =>
        latest === undefined || (m.revision ?? '') > (latest.revision ?? '')
          ? m
          : latest,
      undefined
    );
  }

  findModuleByNamespace(namespace: string): Module | undefined {
    return this.#modules.find((m) => m.namespace === namespace);
  }
}
