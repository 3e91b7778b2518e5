import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  NotFoundError,
  loadSchemaDocument,
  renderHelp,
  renderModuleTree,
  resolveTreeOptions,
  type RawSchemaDocument,
  type TreeOptions,
} from '../index.js';

describe('public API surface', () => {
  const document: RawSchemaDocument = {
    modules: [
      {
        name: 'acme-system',
        prefix: 'sys',
        namespace: 'urn:example:acme-system',
        data: [
          {
            kind: 'container',
            name: 'system',
            children: [
              { kind: 'leaf', name: 'hostname', type: 'string' },
              { kind: 'leaf', name: 'contact', type: 'string', mandatory: true },
            ],
          },
        ],
      },
    ],
  };

  it('loads a document and renders a module from the package entry point', () => {
    const context = loadSchemaDocument(document).unwrap();
    expect([...renderModuleTree(context, { name: 'acme-system' })]).toEqual([
      'module: acme-system',
      '  +--rw system',
      '     +--rw hostname?   string',
      '     +--rw contact     string',
    ]);
  });

  it('reports unknown modules with a typed error', () => {
    const context = loadSchemaDocument(document).unwrap();
    try {
      renderModuleTree(context, { name: 'acme-other' });
      expect.unreachable('lookup should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.errorCode).toBe(ErrorCode.MODULE_NOT_FOUND);
      }
    }
  });

  it('exposes option defaults and the legend', () => {
    const opts: TreeOptions = { lineLength: 20 };
    expect(resolveTreeOptions(opts).lineLength).toBe(20);
    expect(renderHelp(opts).every((line) => line.length <= 20)).toBe(true);
  });
});
