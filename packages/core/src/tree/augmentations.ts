import type { Module } from '../model/schema-context.js';
import { pathKey, type QName } from '../model/schema-node.js';
import type { SchemaTree } from '../model/schema-tree.js';
import type { Role } from './line.js';
import type { NamespacePrefixMap } from './prefixes.js';

export interface AugmentationGroup {
  readonly target: readonly QName[];
  readonly members: readonly SchemaTree[];
  /** Role the members are drawn with: input parameters are `-w` */
  readonly role: Role;
}

const BODY_ROLES = {
  input: 'rpc-input',
  output: 'rpc-output',
} as const satisfies Record<'input' | 'output', Role>;

/**
 * Augmenting nodes of one module, grouped by the path they augment. Groups
 * keep first-seen order and a node appears once per group.
 */
export function groupAugmentations(
  root: SchemaTree,
  module: Module
): AugmentationGroup[] {
  const groups = new Map<
    string,
    { target: readonly QName[]; members: Map<string, SchemaTree> }
  >();
  const roles = new Map<string, Role>();
  for (const augment of module.augments) {
    if (augment.operationBody !== null) {
      roles.set(pathKey(augment.target), BODY_ROLES[augment.operationBody]);
    }
  }

  for (const child of root.children.values()) {
    if (!child.augmenting || child.namespace !== module.namespace) continue;

    const target = child.path.slice(0, -1);
    const key = pathKey(target);
    let group = groups.get(key);
    if (group === undefined) {
      group = { target, members: new Map() };
      groups.set(key, group);
    }
    group.members.set(pathKey(child.path), child);
  }

  return [...groups.entries()].map(([key, { target, members }]) => ({
    target,
    members: [...members.values()],
    role: roles.get(key) ?? 'plain',
  }));
}

export function augmentHeader(
  target: readonly QName[],
  prefixes: NamespacePrefixMap
): string {
  const path = target
    .map((segment) => {
      const prefix = prefixes.get(segment.namespace);
      return prefix === undefined
        ? `/${segment.localName}`
        : `/${prefix}:${segment.localName}`;
    })
    .join('');
  return `augment ${path}:`;
}
