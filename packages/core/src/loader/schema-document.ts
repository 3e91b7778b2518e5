/**
 * Schema document loader
 *
 * Reads a JSON description of already-parsed YANG modules, validates it
 * against schema-document.schema.json and builds a SchemaContext with every
 * augment statement applied to its target.
 */

import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import path from 'node:path';
import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { NotFoundError, ParseError, SchemaError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import {
  SchemaContext,
  type Augmentation,
  type Module,
} from '../model/schema-context.js';
import {
  childNodes,
  qnameEquals,
  type ActionNode,
  type CaseNode,
  type DataNode,
  type NotificationNode,
  type OperationBodyNode,
  type OperationNode,
  type QName,
  type SchemaNode,
  type Status,
  type TypeRef,
} from '../model/schema-node.js';
import type {
  RawAction,
  RawCase,
  RawDataNode,
  RawModule,
  RawNotification,
  RawOperation,
  RawSchemaDocument,
} from './types.js';

const requireSchema = createRequire(import.meta.url);
const documentSchema: SchemaObject = requireSchema(
  './schema-document.schema.json'
);

interface DocumentValidator {
  ajv: Ajv;
  validate: ValidateFunction<RawSchemaDocument>;
}

let documentValidator: DocumentValidator | undefined;

function getDocumentValidator(): DocumentValidator {
  if (!documentValidator) {
    const ajv = new Ajv({ allErrors: false, discriminator: true });
    documentValidator = {
      ajv,
      validate: ajv.compile<RawSchemaDocument>(documentSchema),
    };
  }
  return documentValidator;
}

/** Where a node is being built: its parent's path and effective config */
interface Parent {
  readonly path: readonly QName[];
  readonly config: boolean | null;
  readonly augmenting: boolean;
}

/**
 * Prefix and namespace resolution for the module a statement is written in
 */
class ModuleScope {
  readonly imports = new Map<string, string>();

  constructor(
    readonly raw: RawModule,
    readonly documentPath: string,
    private readonly namespaces: ReadonlyMap<string, string>
  ) {
    this.imports.set(raw.prefix, raw.name);
    for (const imp of raw.imports ?? []) {
      this.imports.set(imp.prefix, imp.module);
    }
  }

  qname(localName: string): QName {
    return {
      module: this.raw.name,
      namespace: this.raw.namespace,
      localName,
    };
  }

  resolvePrefix(prefix: string, documentPath: string): string {
    const moduleName = this.imports.get(prefix);
    if (moduleName === undefined) {
      throw new SchemaError({
        message: `Unknown prefix "${prefix}" in module ${this.raw.name}`,
        errorCode: ErrorCode.UNRESOLVED_PREFIX,
        context: { module: this.raw.name, documentPath },
      });
    }
    return moduleName;
  }

  namespaceOf(moduleName: string): string | undefined {
    return this.namespaces.get(moduleName);
  }

  typeRef(
    rawType: string,
    leafrefPath: string | undefined,
    at: string
  ): TypeRef {
    const colon = rawType.indexOf(':');
    if (colon < 0) {
      return leafrefPath === undefined
        ? { name: rawType }
        : { name: rawType, path: leafrefPath };
    }
    const prefix = rawType.slice(0, colon);
    const name = rawType.slice(colon + 1);
    const moduleName = this.resolvePrefix(prefix, at);
    if (moduleName === this.raw.name) {
      return { name };
    }
    const namespace = this.namespaceOf(moduleName);
    return namespace === undefined ? { name, prefix } : { name, namespace };
  }
}

type NodeCommon = Pick<
  DataNode,
  'qname' | 'path' | 'status' | 'config' | 'ifFeatures' | 'augmenting'
>;

function base(
  scope: ModuleScope,
  raw: { name: string; status?: Status; ifFeatures?: string[] },
  parent: Parent,
  config: boolean | null
): NodeCommon {
  const qname = scope.qname(raw.name);
  return {
    qname,
    path: [...parent.path, qname],
    status: raw.status ?? 'current',
    config,
    ifFeatures: raw.ifFeatures ?? [],
    augmenting: parent.augmenting,
  };
}

function inheritConfig(
  parent: Parent,
  own: boolean | undefined
): boolean | null {
  if (parent.config === null) return null;
  if (!parent.config) return false;
  return own ?? true;
}

function buildDataNode(
  scope: ModuleScope,
  raw: RawDataNode,
  parent: Parent,
  at: string
): DataNode {
  const config = inheritConfig(parent, raw.config);
  const common = base(scope, raw, parent, config);
  const self: Parent = {
    path: common.path,
    config,
    augmenting: parent.augmenting,
  };

  switch (raw.kind) {
    case 'container':
      return {
        ...common,
        kind: 'container',
        presence: raw.presence ?? false,
        children: buildChildren(scope, raw.children, self, `${at}/children`),
        actions: (raw.actions ?? []).map((action, i) =>
          buildOperation(scope, action, 'action', self, `${at}/actions/${i}`)
        ),
      };
    case 'list':
      return {
        ...common,
        kind: 'list',
        keys: (raw.key ?? []).map((name) => scope.qname(name)),
        children: buildChildren(scope, raw.children, self, `${at}/children`),
        actions: (raw.actions ?? []).map((action, i) =>
          buildOperation(scope, action, 'action', self, `${at}/actions/${i}`)
        ),
      };
    case 'leaf':
      return {
        ...common,
        kind: 'leaf',
        type: scope.typeRef(raw.type, raw.path, `${at}/type`),
        mandatory: raw.mandatory ?? false,
      };
    case 'leaf-list':
      return {
        ...common,
        kind: 'leaf-list',
        type: scope.typeRef(raw.type, raw.path, `${at}/type`),
      };
    case 'choice': {
      const cases = (raw.children ?? []).map((child, i) =>
        buildCase(scope, child, self, `${at}/children/${i}`)
      );
      return {
        ...common,
        kind: 'choice',
        mandatory: raw.mandatory ?? false,
        cases,
      };
    }
    case 'anydata':
    case 'anyxml':
      return {
        ...common,
        kind: raw.kind,
        mandatory: raw.mandatory ?? false,
      };
  }
}

function buildChildren(
  scope: ModuleScope,
  raw: RawDataNode[] | undefined,
  parent: Parent,
  at: string
): DataNode[] {
  return (raw ?? []).map((child, i) =>
    buildDataNode(scope, child, parent, `${at}/${i}`)
  );
}

/**
 * Build a case; a data node written directly under a choice is wrapped in an
 * implicit case of the same name.
 */
function buildCase(
  scope: ModuleScope,
  raw: RawCase | RawDataNode,
  parent: Parent,
  at: string
): CaseNode {
  if (raw.kind === 'case') {
    const common = base(scope, raw, parent, parent.config);
    return {
      ...common,
      kind: 'case',
      children: buildChildren(
        scope,
        raw.children,
        {
          path: common.path,
          config: parent.config,
          augmenting: parent.augmenting,
        },
        `${at}/children`
      ),
    };
  }
  const common = base(scope, { name: raw.name }, parent, parent.config);
  return {
    ...common,
    kind: 'case',
    children: [
      buildDataNode(
        scope,
        raw,
        {
          path: common.path,
          config: parent.config,
          augmenting: parent.augmenting,
        },
        at
      ),
    ],
  };
}

function buildOperation<K extends 'rpc' | 'action'>(
  scope: ModuleScope,
  raw: RawOperation,
  kind: K,
  parent: Parent,
  at: string
): OperationNode<K> {
  const common = base(scope, raw, parent, null);
  const body = (
    which: 'input' | 'output',
    children: RawDataNode[] | undefined
  ): OperationBodyNode => {
    const qname = scope.qname(which);
    const bodyPath = [...common.path, qname];
    return {
      qname,
      path: bodyPath,
      status: 'current',
      config: null,
      ifFeatures: [],
      augmenting: parent.augmenting,
      kind: which,
      children: buildChildren(
        scope,
        children,
        { path: bodyPath, config: null, augmenting: parent.augmenting },
        `${at}/${which}`
      ),
    };
  };
  return {
    ...common,
    kind,
    input: body('input', raw.input),
    output: body('output', raw.output),
  };
}

function buildNotification(
  scope: ModuleScope,
  raw: RawNotification,
  at: string
): NotificationNode {
  const common = base(
    scope,
    raw,
    { path: [], config: null, augmenting: false },
    null
  );
  return {
    ...common,
    kind: 'notification',
    children: buildChildren(
      scope,
      raw.children,
      { path: common.path, config: false, augmenting: false },
      `${at}/children`
    ),
  };
}

function findTopLevel(module: Module, qname: QName): SchemaNode | undefined {
  const candidates: SchemaNode[] = [
    ...module.dataNodes,
    ...module.rpcs,
    ...module.notifications,
  ];
  return candidates.find((node) => qnameEquals(node.qname, qname));
}

function resolveAugmentTarget(
  scope: ModuleScope,
  targetText: string,
  modules: ReadonlyMap<string, Module>,
  at: string
): {
  target: readonly QName[];
  node: SchemaNode;
  operationBody: 'input' | 'output' | null;
} {
  const target: QName[] = [];
  let node: SchemaNode | undefined;
  let operationBody: 'input' | 'output' | null = null;
  for (const segment of targetText.split('/').slice(1)) {
    const colon = segment.indexOf(':');
    const prefix = colon < 0 ? scope.raw.prefix : segment.slice(0, colon);
    const localName = colon < 0 ? segment : segment.slice(colon + 1);
    const moduleName = scope.resolvePrefix(prefix, at);
    const module = modules.get(moduleName);
    if (module === undefined) {
      throw new NotFoundError('Augment target', targetText, {
        module: scope.raw.name,
        documentPath: at,
      });
    }
    const qname: QName = {
      module: module.name,
      namespace: module.namespace,
      localName,
    };
    node =
      node === undefined
        ? findTopLevel(module, qname)
        : childNodes(node).find((child) => qnameEquals(child.qname, qname));
    if (node === undefined) {
      throw new NotFoundError('Augment target', targetText, {
        module: scope.raw.name,
        documentPath: at,
      });
    }
    if (node.kind === 'input' || node.kind === 'output') {
      operationBody = node.kind;
    }
    target.push(qname);
  }
  if (node === undefined) {
    throw new NotFoundError('Augment target', targetText, {
      module: scope.raw.name,
      documentPath: at,
    });
  }
  return { target, node, operationBody };
}

/**
 * Build one augmenting node and add it to its target
 */
function attachAugmentNode(
  scope: ModuleScope,
  raw: RawDataNode | RawCase | RawAction,
  target: SchemaNode,
  at: string
): DataNode | CaseNode | ActionNode {
  const parent: Parent = {
    path: target.path,
    config: target.config,
    augmenting: true,
  };
  const refuse = (): never => {
    throw new SchemaError({
      message: `A ${raw.kind} cannot augment a ${target.kind}`,
      context: { module: scope.raw.name, documentPath: at },
    });
  };

  switch (target.kind) {
    case 'container':
    case 'list': {
      if (raw.kind === 'case') return refuse();
      if (raw.kind === 'action') {
        const action = buildOperation(scope, raw, 'action', parent, at);
        target.actions.push(action);
        return action;
      }
      const node = buildDataNode(scope, raw, parent, at);
      target.children.push(node);
      return node;
    }
    case 'choice': {
      if (raw.kind === 'action') return refuse();
      const node = buildCase(scope, raw, parent, at);
      target.cases.push(node);
      return node;
    }
    case 'case':
    case 'input':
    case 'output':
    case 'notification': {
      if (raw.kind === 'case' || raw.kind === 'action') return refuse();
      const node = buildDataNode(
        scope,
        raw,
        target.kind === 'notification' ? { ...parent, config: false } : parent,
        at
      );
      target.children.push(node);
      return node;
    }
    case 'leaf':
    case 'leaf-list':
    case 'anydata':
    case 'anyxml':
    case 'rpc':
    case 'action':
      return refuse();
  }
}

function buildContext(document: RawSchemaDocument): SchemaContext {
  const namespaces = new Map<string, string>();
  for (const raw of document.modules) {
    if (!namespaces.has(raw.name)) namespaces.set(raw.name, raw.namespace);
  }

  const scopes = document.modules.map(
    (raw, i) => new ModuleScope(raw, `/modules/${i}`, namespaces)
  );
  const augmentLists = new Map<ModuleScope, Augmentation[]>();
  const built: Module[] = scopes.map((scope) => {
    const { raw } = scope;
    const root: Parent = { path: [], config: true, augmenting: false };
    const augments: Augmentation[] = [];
    augmentLists.set(scope, augments);
    return {
      name: raw.name,
      prefix: raw.prefix,
      namespace: raw.namespace,
      revision: raw.revision,
      imports: new Map(scope.imports),
      features: raw.features ?? [],
      dataNodes: buildChildren(
        scope,
        raw.data,
        root,
        `${scope.documentPath}/data`
      ),
      rpcs: (raw.rpcs ?? []).map((rpc, i) =>
        buildOperation(
          scope,
          rpc,
          'rpc',
          { path: [], config: null, augmenting: false },
          `${scope.documentPath}/rpcs/${i}`
        )
      ),
      notifications: (raw.notifications ?? []).map((n, i) =>
        buildNotification(scope, n, `${scope.documentPath}/notifications/${i}`)
      ),
      augments,
    };
  });

  // Latest revision per name is the one prefixes resolve to
  const context = new SchemaContext(built);
  const byName = new Map<string, Module>();
  for (const module of built) {
    const latest = context.findModule(module.name);
    if (latest !== undefined) byName.set(module.name, latest);
  }

  scopes.forEach((scope) => {
    const augments = augmentLists.get(scope) ?? [];
    (scope.raw.augments ?? []).forEach((rawAugment, i) => {
      const at = `${scope.documentPath}/augments/${i}`;
      const { target, node, operationBody } = resolveAugmentTarget(
        scope,
        rawAugment.target,
        byName,
        `${at}/target`
      );
      const nodes = rawAugment.nodes.map((rawNode, j) =>
        attachAugmentNode(scope, rawNode, node, `${at}/nodes/${j}`)
      );
      augments.push({
        targetText: rawAugment.target,
        target,
        operationBody,
        nodes,
      });
    });
  });

  return context;
}

/**
 * Validate a parsed schema document and build its SchemaContext
 */
export function loadSchemaDocument(
  input: unknown
): Result<SchemaContext, SchemaError | NotFoundError> {
  const { ajv, validate } = getDocumentValidator();
  if (!validate(input)) {
    return err(
      new SchemaError({
        message: `Invalid schema document: ${ajv.errorsText(validate.errors, {
          dataVar: 'document',
        })}`,
        context: { documentPath: '' },
      })
    );
  }
  try {
    return ok(buildContext(input));
  } catch (error) {
    if (error instanceof SchemaError || error instanceof NotFoundError) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Read, parse and load a schema document from disk
 */
export async function loadSchemaFile(filePath: string): Promise<SchemaContext> {
  const absolute = path.resolve(filePath);
  let raw: string;
  try {
    raw = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new ParseError({
      message: `Cannot read schema document ${absolute}`,
      context: { documentPath: absolute },
      cause: error instanceof Error ? error : undefined,
    });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ParseError({
      message: `Invalid JSON in ${absolute}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      context: { documentPath: absolute },
      cause: error instanceof Error ? error : undefined,
    });
  }
  const result = loadSchemaDocument(parsed);
  if (result._tag === 'Err') {
    throw result.error;
  }
  return result.value;
}
