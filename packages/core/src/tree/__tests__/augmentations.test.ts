import { describe, it, expect } from 'vitest';

import { loadFixtureContext } from '../../../test/fixtures/load-fixture.js';
import { buildSchemaTree } from '../../model/schema-tree.js';
import { augmentHeader, groupAugmentations } from '../augmentations.js';

const context = loadFixtureContext('server.json');
const tree = buildSchemaTree(context);

describe('groupAugmentations', () => {
  it('groups augmenting nodes of a module by target path', () => {
    const monitoring = context.findModule('example-monitoring');
    if (monitoring === undefined) throw new Error('fixture module missing');

    const groups = groupAugmentations(tree, monitoring);
    expect(groups.map((g) => g.target.map((s) => s.localName))).toEqual([
      ['server', 'stats'],
      ['server', 'transport'],
    ]);
    expect(groups.map((g) => g.members.map((m) => m.node?.kind))).toEqual([
      ['leaf'],
      ['case'],
    ]);
  });

  it('draws members of an input or output augmentation with that role', () => {
    const operations = loadFixtureContext('operations.json');
    const ext = operations.findModule('example-ops-ext');
    if (ext === undefined) throw new Error('fixture module missing');

    const groups = groupAugmentations(buildSchemaTree(operations), ext);
    expect(groups.map((g) => g.role)).toEqual([
      'rpc-input',
      'plain',
      'rpc-output',
    ]);
    expect(groups[1]?.members.map((m) => m.node?.qname.localName)).toEqual([
      'ntp',
      'timezone',
      'dns',
    ]);
  });

  it('finds nothing for a module that augments nothing', () => {
    const server = context.findModule('example-server');
    if (server === undefined) throw new Error('fixture module missing');
    expect(groupAugmentations(tree, server)).toEqual([]);
  });
});

describe('augmentHeader', () => {
  const target = [
    { module: 'a', namespace: 'urn:a', localName: 'top' },
    { module: 'b', namespace: 'urn:b', localName: 'inner' },
  ];

  it('prefixes segments whose namespace is mapped', () => {
    expect(augmentHeader(target, new Map([['urn:a', 'a']]))).toBe(
      'augment /a:top/inner:'
    );
  });
});
