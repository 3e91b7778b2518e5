import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';

import {
  fixturePath,
  loadFixtureContext,
} from '../../../test/fixtures/load-fixture.js';
import { ErrorCode } from '../../errors/codes.js';
import type { SchemaNode } from '../../model/schema-node.js';
import { NotFoundError, ParseError, SchemaError } from '../../types/errors.js';
import { loadSchemaDocument, loadSchemaFile } from '../schema-document.js';

function moduleDoc(extra: Record<string, unknown> = {}): unknown {
  return {
    modules: [
      {
        name: 'acme',
        prefix: 'ac',
        namespace: 'urn:example:acme',
        ...extra,
      },
    ],
  };
}

function child(node: SchemaNode | undefined, name: string): SchemaNode {
  if (node === undefined) throw new Error('no parent node');
  const found = ((): SchemaNode[] => {
    switch (node.kind) {
      case 'container':
      case 'list':
        return [...node.children, ...node.actions];
      case 'choice':
        return node.cases;
      case 'case':
      case 'notification':
      case 'input':
      case 'output':
        return node.children;
      default:
        return [];
    }
  })().find((n) => n.qname.localName === name);
  if (found === undefined) throw new Error(`no child ${name}`);
  return found;
}

describe('loadSchemaDocument', () => {
  const context = loadFixtureContext('server.json');
  const server = context.findModule('example-server');

  it('builds every module of the document', () => {
    expect(context.modules.map((m) => m.name)).toEqual([
      'example-server',
      'example-types',
      'example-monitoring',
    ]);
    expect(server?.imports.get('et')).toBe('example-types');
    expect(server?.imports.get('srv')).toBe('example-server');
    expect(server?.features).toEqual(['tls']);
  });

  it('resolves list keys and derived types', () => {
    const list = server?.dataNodes[0];
    expect(list?.kind).toBe('list');
    if (list?.kind !== 'list') return;
    expect(list.keys.map((k) => k.localName)).toEqual(['id']);

    const port = child(list, 'port');
    expect(port.kind === 'leaf' && port.type).toEqual({
      name: 'port-number',
      namespace: 'urn:example:types',
    });
  });

  it('wraps a data node written under a choice in an implicit case', () => {
    const transport = child(server?.dataNodes[0], 'transport');
    const implicit = child(transport, 'tls-profile');
    expect(implicit.kind).toBe('case');
    const inner = child(implicit, 'tls-profile');
    expect(inner.kind).toBe('leaf');
    expect(inner.path.map((q) => q.localName)).toEqual([
      'server',
      'transport',
      'tls-profile',
      'tls-profile',
    ]);
  });

  it('inherits config false from the parent', () => {
    const uptime = child(child(server?.dataNodes[0], 'stats'), 'uptime');
    expect(uptime.config).toBe(false);
  });

  it('leaves config unset inside operations and false in notifications', () => {
    const rpc = server?.rpcs[0];
    expect(rpc?.input.children[0]?.config).toBeNull();
    expect(server?.notifications[0]?.children[0]?.config).toBe(false);
  });

  it('attaches augmenting nodes to their targets', () => {
    const stats = child(server?.dataNodes[0], 'stats');
    const load = child(stats, 'load');
    expect(load.augmenting).toBe(true);
    expect(load.config).toBe(false);
    expect(load.qname.namespace).toBe('urn:example:monitoring');

    const monitoring = context.findModule('example-monitoring');
    expect(monitoring?.augments.map((a) => a.targetText)).toEqual([
      '/srv:server/srv:stats',
      '/srv:server/srv:transport',
    ]);
  });

  it('records which operation body an augmentation lands in', () => {
    const operations = loadFixtureContext('operations.json');
    const ext = operations.findModule('example-ops-ext');
    expect(ext?.augments.map((a) => a.operationBody)).toEqual([
      'input',
      null,
      'output',
    ]);
    expect(
      context.findModule('example-monitoring')?.augments.map(
        (a) => a.operationBody
      )
    ).toEqual([null, null]);
  });

  it('rejects documents that do not match the document schema', () => {
    const result = loadSchemaDocument({ modules: [{ name: 'acme' }] });
    expect(result._tag).toBe('Err');
    if (result._tag !== 'Err') return;
    expect(result.error).toBeInstanceOf(SchemaError);
    expect(result.error.errorCode).toBe(ErrorCode.INVALID_SCHEMA_DOCUMENT);
    expect(result.error.message).toMatch(/^Invalid schema document: /);
  });

  it('rejects unknown node kinds', () => {
    const result = loadSchemaDocument(
      moduleDoc({ data: [{ kind: 'leafy', name: 'x', type: 'string' }] })
    );
    expect(result._tag).toBe('Err');
  });

  it('reports prefixes that are not imported', () => {
    const result = loadSchemaDocument(
      moduleDoc({ data: [{ kind: 'leaf', name: 'x', type: 'nope:thing' }] })
    );
    if (result._tag !== 'Err') throw new Error('expected an error');
    expect(result.error.errorCode).toBe(ErrorCode.UNRESOLVED_PREFIX);
    expect(result.error.message).toBe('Unknown prefix "nope" in module acme');
    expect(result.error.context?.documentPath).toBe(
      '/modules/0/data/0/type'
    );
  });

  it('keeps the written prefix of a type from a module outside the document', () => {
    const result = loadSchemaDocument(
      moduleDoc({
        imports: [{ module: 'ietf-inet-types', prefix: 'inet' }],
        data: [{ kind: 'leaf', name: 'addr', type: 'inet:ip-address' }],
      })
    );
    const node = result.unwrap().modules[0]?.dataNodes[0];
    expect(node?.kind === 'leaf' && node.type).toEqual({
      name: 'ip-address',
      prefix: 'inet',
    });
  });

  it('reports augment targets that do not exist', () => {
    const result = loadSchemaDocument(
      moduleDoc({
        data: [{ kind: 'container', name: 'top' }],
        augments: [
          {
            target: '/ac:top/ac:missing',
            nodes: [{ kind: 'leaf', name: 'x', type: 'string' }],
          },
        ],
      })
    );
    if (result._tag !== 'Err') throw new Error('expected an error');
    expect(result.error).toBeInstanceOf(NotFoundError);
    expect(result.error.message).toBe(
      'Augment target not found: /ac:top/ac:missing'
    );
    expect(result.error.getExitCode()).toBe(11);
  });

  it('refuses to augment a leaf', () => {
    const result = loadSchemaDocument(
      moduleDoc({
        data: [{ kind: 'leaf', name: 'top', type: 'string' }],
        augments: [
          {
            target: '/ac:top',
            nodes: [{ kind: 'leaf', name: 'x', type: 'string' }],
          },
        ],
      })
    );
    if (result._tag !== 'Err') throw new Error('expected an error');
    expect(result.error.message).toBe('A leaf cannot augment a leaf');
  });

  it('adds augmenting actions to the target container', () => {
    const result = loadSchemaDocument(
      moduleDoc({
        data: [{ kind: 'container', name: 'top' }],
        augments: [
          {
            target: '/ac:top',
            nodes: [{ kind: 'action', name: 'reboot' }],
          },
        ],
      })
    );
    const top = result.unwrap().modules[0]?.dataNodes[0];
    expect(top?.kind === 'container' && top.actions.map((a) => a.kind)).toEqual(
      ['action']
    );
  });

  it('finds the latest revision when none is requested', () => {
    const result = loadSchemaDocument({
      modules: [
        { name: 'm', prefix: 'm', namespace: 'urn:m', revision: '2020-01-01' },
        { name: 'm', prefix: 'm', namespace: 'urn:m', revision: '2022-06-30' },
      ],
    });
    const context = result.unwrap();
    expect(context.findModule('m')?.revision).toBe('2022-06-30');
    expect(context.findModule('m', '2020-01-01')?.revision).toBe('2020-01-01');
    expect(context.findModule('m', '2021-01-01')).toBeUndefined();
  });
});

describe('loadSchemaFile', () => {
  it('loads a document from disk', async () => {
    const context = await loadSchemaFile(fixturePath('server.json'));
    expect(context.modules).toHaveLength(3);
  });

  it('throws ParseError for a missing file', async () => {
    await expect(loadSchemaFile('/nonexistent/schema.json')).rejects.toThrow(
      ParseError
    );
  });

  it('throws ParseError for invalid JSON', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'yangtree-loader-'));
    const file = path.join(dir, 'broken.json');
    try {
      await writeFile(file, '{ "modules": [', 'utf8');
      await expect(loadSchemaFile(file)).rejects.toMatchObject({
        errorCode: ErrorCode.PARSE_ERROR,
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('throws the SchemaError of an invalid document', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'yangtree-loader-'));
    const file = path.join(dir, 'invalid.json');
    try {
      await writeFile(file, JSON.stringify({ modules: 'none' }), 'utf8');
      await expect(loadSchemaFile(file)).rejects.toBeInstanceOf(SchemaError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
