// @yangtree/core entry point
//
// Public API:
// - loadSchemaDocument / loadSchemaFile turn a JSON schema document into a
//   SchemaContext.
// - renderModuleTree yields the tree diagram of one module line by line;
//   renderHelp gives the symbol legend.
// - Error types, exit codes and the CLI error presenter.

export * from './types/index.js';

// Schema model
export type {
  ActionNode,
  AnyNode,
  CaseNode,
  ChoiceNode,
  ContainerNode,
  DataNode,
  LeafListNode,
  LeafNode,
  ListNode,
  NotificationNode,
  OperationBodyNode,
  QName,
  RpcNode,
  SchemaNode,
  SchemaNodeKind,
  Status,
  TypeRef,
} from './model/schema-node.js';
export {
  SchemaContext,
  type Augmentation,
  type Module,
} from './model/schema-context.js';
export { SchemaTree, buildSchemaTree } from './model/schema-tree.js';

// Loader
export {
  loadSchemaDocument,
  loadSchemaFile,
} from './loader/schema-document.js';
export type { RawSchemaDocument } from './loader/types.js';

// Tree rendering
export {
  TreeWalker,
  renderHelp,
  renderModuleTree,
  renderTrees,
  type ModuleSource,
  type RenderDependencies,
  type RenderTreesDependencies,
} from './tree/walker.js';
export { TREE_HELP } from './tree/help.js';

// Errors
export {
  ErrorCode,
  type Severity,
  getExitCode,
  EXIT_CODES,
} from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView } from './errors/presenter.js';
