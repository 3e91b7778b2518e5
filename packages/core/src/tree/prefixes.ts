import type { Module, SchemaContext } from '../model/schema-context.js';
import type { QName } from '../model/schema-node.js';
import type { ResolvedTreeOptions } from '../types/options.js';

/** Namespace to the prefix shown in front of names from that namespace */
export type NamespacePrefixMap = ReadonlyMap<string, string>;

/**
 * Every module of the context gets a display prefix, except the printed
 * module itself unless `prefixMainModule` is set. With `prefixModule` the
 * module name is shown instead of its prefix.
 */
export function buildNamespacePrefixMap(
  context: SchemaContext,
  module: Module,
  options: Pick<ResolvedTreeOptions, 'prefixModule' | 'prefixMainModule'>
): NamespacePrefixMap {
  const prefixes = new Map<string, string>();
  for (const m of context.modules) {
    if (m.namespace === module.namespace && !options.prefixMainModule) {
      continue;
    }
    if (!prefixes.has(m.namespace)) {
      prefixes.set(m.namespace, options.prefixModule ? m.name : m.prefix);
    }
  }
  return prefixes;
}

export function prefixedName(qname: QName, prefixes: NamespacePrefixMap): string {
  const prefix = prefixes.get(qname.namespace);
  return prefix === undefined
    ? qname.localName
    : `${prefix}:${qname.localName}`;
}
