/**
 * Schema node model
 *
 * A closed union over the YANG statements that appear in a tree diagram.
 * Nodes are produced by the schema document loader and only read by the
 * renderer.
 */

export interface QName {
  /** Name of the module that defines the node */
  readonly module: string;
  readonly namespace: string;
  readonly localName: string;
}

export type Status = 'current' | 'deprecated' | 'obsolete';

export interface TypeRef {
  /** Type name without prefix, e.g. 'string', 'ip-address', 'leafref' */
  readonly name: string;
  /** Namespace of the module defining a derived type; absent for built-ins */
  readonly namespace?: string;
  /** Prefix as written, kept when the defining module is not in the context */
  readonly prefix?: string;
  /** Path argument of a leafref */
  readonly path?: string;
}

interface NodeBase {
  readonly qname: QName;
  /** QNames from the module root to this node, choice and case included */
  readonly path: readonly QName[];
  readonly status: Status;
  /** null where config does not apply (operations, input, output, notifications) */
  readonly config: boolean | null;
  readonly ifFeatures: readonly string[];
  /** True when the node was added to its parent by an augment statement */
  readonly augmenting: boolean;
}

export interface ContainerNode extends NodeBase {
  readonly kind: 'container';
  readonly presence: boolean;
  readonly children: DataNode[];
  readonly actions: ActionNode[];
}

export interface ListNode extends NodeBase {
  readonly kind: 'list';
  readonly keys: readonly QName[];
  readonly children: DataNode[];
  readonly actions: ActionNode[];
}

export interface LeafNode extends NodeBase {
  readonly kind: 'leaf';
  readonly type: TypeRef;
  readonly mandatory: boolean;
}

export interface LeafListNode extends NodeBase {
  readonly kind: 'leaf-list';
  readonly type: TypeRef;
}

export interface ChoiceNode extends NodeBase {
  readonly kind: 'choice';
  readonly mandatory: boolean;
  readonly cases: CaseNode[];
}

export interface CaseNode extends NodeBase {
  readonly kind: 'case';
  readonly children: DataNode[];
}

export interface AnyNode extends NodeBase {
  readonly kind: 'anydata' | 'anyxml';
  readonly mandatory: boolean;
}

export interface OperationBodyNode extends NodeBase {
  readonly kind: 'input' | 'output';
  readonly children: DataNode[];
}

export interface OperationNode<K extends 'rpc' | 'action'> extends NodeBase {
  readonly kind: K;
  readonly input: OperationBodyNode;
  readonly output: OperationBodyNode;
}

export type RpcNode = OperationNode<'rpc'>;
export type ActionNode = OperationNode<'action'>;

export interface NotificationNode extends NodeBase {
  readonly kind: 'notification';
  readonly children: DataNode[];
}

/** Nodes that may appear in a data tree or inside a case */
export type DataNode =
  | ContainerNode
  | ListNode
  | LeafNode
  | LeafListNode
  | ChoiceNode
  | AnyNode;

export type SchemaNode =
  | DataNode
  | CaseNode
  | OperationBodyNode
  | RpcNode
  | ActionNode
  | NotificationNode;

export type SchemaNodeKind = SchemaNode['kind'];

export function qnameEquals(a: QName, b: QName): boolean {
  return a.namespace === b.namespace && a.localName === b.localName;
}

/** Stable string key for a schema path, used for ordered maps and sets */
export function pathKey(path: readonly QName[]): string {
  return path.map((q) => `${q.module}:${q.localName}`).join('/');
}

/**
 * Structural children of a node in document order: data nodes, cases,
 * input/output and actions.
 */
export function childNodes(node: SchemaNode): SchemaNode[] {
  switch (node.kind) {
    case 'container':
    case 'list':
      return [...node.children, ...node.actions];
    case 'choice':
      return [...node.cases];
    case 'case':
    case 'input':
    case 'output':
    case 'notification':
      return [...node.children];
    case 'rpc':
    case 'action':
      return [node.input, node.output];
    case 'leaf':
    case 'leaf-list':
    case 'anydata':
    case 'anyxml':
      return [];
  }
}
