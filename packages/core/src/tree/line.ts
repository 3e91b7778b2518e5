import type { Module } from '../model/schema-context.js';
import {
  qnameEquals,
  type QName,
  type SchemaNode,
  type Status,
  type TypeRef,
} from '../model/schema-node.js';
import { renderConnectors } from './connectors.js';
import { prefixedName, type NamespacePrefixMap } from './prefixes.js';
import type { SuppressionSet } from './suppression.js';

/**
 * Whether a node sits in ordinary data, in an operation's input or in its
 * output. Input and output override the config-derived flags.
 */
export type Role = 'plain' | 'rpc-input' | 'rpc-output';

/** Keys of the nearest enclosing list and where that list lives */
export interface KeyScope {
  readonly listPath: readonly QName[];
  readonly keys: readonly QName[];
}

/** Everything about a node's position needed to draw its line */
export interface RenderContext {
  readonly node: SchemaNode;
  readonly connectors: readonly boolean[];
  readonly role: Role;
  readonly keys: KeyScope | null;
  /** Depth budget left when this line is produced */
  readonly depth: number;
}

/** Per-module constants shared by every line of one rendering pass */
export interface LineEnvironment {
  readonly module: Module;
  readonly prefixes: NamespacePrefixMap;
  readonly suppressed: SuppressionSet;
}

const STATUS_GLYPHS = {
  current: '+',
  deprecated: 'x',
  obsolete: 'o',
} as const satisfies Record<Status, string>;

const TYPE_GAP = '   ';

/**
 * A finished diagram line. `typeColumn` is the width the label is padded to
 * before the type, shared by a group of siblings.
 */
export class Line {
  constructor(
    readonly connectors: string,
    readonly status: string,
    readonly flags: string | null,
    readonly label: string,
    readonly keys: readonly string[],
    readonly type: string | null,
    readonly typeColumn: number,
    readonly ifFeatures: readonly string[]
  ) {}

  toString(): string {
    let text = `${this.connectors}${this.status}--`;
    if (this.flags !== null) {
      text += `${this.flags} `;
    }
    text += this.label;
    if (this.keys.length > 0) {
      text += ` [${this.keys.join(' ')}]`;
    }
    if (this.type !== null) {
      text += ' '.repeat(Math.max(0, this.typeColumn - this.label.length));
      text += TYPE_GAP + this.type;
    }
    if (this.ifFeatures.length > 0) {
      text += ` {${this.ifFeatures.join(',')}}?`;
    }
    return text;
  }
}

/** Clip a line to the configured width */
export function truncate(text: string, width: number): string {
  return text.length > width ? text.slice(0, width) : text;
}

export function flagsFor(node: SchemaNode, role: Role): string | null {
  switch (node.kind) {
    case 'rpc':
    case 'action':
      return '-x';
    case 'notification':
      return '-n';
    case 'case':
      return null;
    case 'input':
      return '-w';
    case 'output':
      return 'ro';
    default:
      if (role === 'rpc-input') return '-w';
      if (role === 'rpc-output') return 'ro';
      return node.config === true ? 'rw' : 'ro';
  }
}

/**
 * A leaf is a key when its name is one of the enclosing list's keys and its
 * data parent is that list. Choice and case levels are skipped when
 * comparing, since they do not exist in the data tree.
 */
export function isListKey(
  node: SchemaNode,
  scope: KeyScope | null,
  suppressed: SuppressionSet
): boolean {
  if (node.kind !== 'leaf' || scope === null) return false;
  if (!scope.keys.some((key) => qnameEquals(key, node.qname))) return false;

  const parent = suppressed.dataPath(node.path.slice(0, -1));
  const list = suppressed.dataPath(scope.listPath);
  return (
    parent.length === list.length &&
    parent.every((segment, i) => {
      const other = list[i];
      return other !== undefined && qnameEquals(segment, other);
    })
  );
}

/** Name decorated for its kind, followed by the optionality marker */
export function labelOf(
  context: RenderContext,
  env: LineEnvironment
): string {
  const { node } = context;
  const name = prefixedName(node.qname, env.prefixes);
  switch (node.kind) {
    case 'choice':
      return `(${name})${node.mandatory ? '' : '?'}`;
    case 'case':
      return `:(${name})`;
    case 'container':
      return node.presence ? `${name}!` : name;
    case 'list':
    case 'leaf-list':
      return `${name}*`;
    case 'leaf':
      return node.mandatory || isListKey(node, context.keys, env.suppressed)
        ? name
        : `${name}?`;
    case 'anydata':
    case 'anyxml':
      return node.mandatory ? name : `${name}?`;
    default:
      return name;
  }
}

/** True for the node kinds that print something in the type column */
export function hasTypeColumn(node: SchemaNode): boolean {
  return (
    node.kind === 'leaf' ||
    node.kind === 'leaf-list' ||
    node.kind === 'anydata' ||
    node.kind === 'anyxml'
  );
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Leafref paths drop the printed module's own prefix unless that module is
 * shown with a prefix anyway.
 */
function leafrefTarget(path: string, env: LineEnvironment): string {
  if (env.prefixes.has(env.module.namespace)) return path;
  const own = new RegExp(`(^|[/\\[(\\s=])${escapeRegExp(env.module.prefix)}:`, 'g');
  return path.replace(own, '$1');
}

export function typeText(type: TypeRef, env: LineEnvironment): string {
  if (type.name === 'leafref' && type.path !== undefined) {
    return `-> ${leafrefTarget(type.path, env)}`;
  }
  if (type.namespace !== undefined) {
    const prefix = env.prefixes.get(type.namespace);
    return prefix === undefined ? type.name : `${prefix}:${type.name}`;
  }
  if (type.prefix !== undefined) {
    return `${type.prefix}:${type.name}`;
  }
  return type.name;
}

function typeOf(node: SchemaNode, env: LineEnvironment): string | null {
  switch (node.kind) {
    case 'leaf':
    case 'leaf-list':
      return typeText(node.type, env);
    case 'anydata':
      return '<anydata>';
    case 'anyxml':
      return '<anyxml>';
    default:
      return null;
  }
}

export function renderLine(
  context: RenderContext,
  env: LineEnvironment,
  typeColumn: number
): Line {
  const { node } = context;
  return new Line(
    renderConnectors(context.connectors),
    STATUS_GLYPHS[node.status],
    flagsFor(node, context.role),
    labelOf(context, env),
    node.kind === 'list' ? node.keys.map((key) => key.localName) : [],
    typeOf(node, env),
    typeColumn,
    node.ifFeatures
  );
}
