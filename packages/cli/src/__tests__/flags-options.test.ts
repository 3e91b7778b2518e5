import { describe, it, expect } from 'vitest';
import { ConfigError } from '@yangtree/core';

import {
  collect,
  parseModuleSpec,
  parseTreeOptions,
  resolveLogLevel,
} from '../flags.js';

describe('CLI flag helpers', () => {
  describe('parseTreeOptions', () => {
    it('leaves flags that were not given undefined', () => {
      expect(parseTreeOptions({})).toEqual({});
    });

    it('maps every tree flag to its option', () => {
      expect(
        parseTreeOptions({
          treeDepth: '3',
          treeLineLength: ' 72 ',
          treeHelp: true,
          treePrefixModule: true,
          treePrefixMainModule: false,
        })
      ).toEqual({
        depth: 3,
        lineLength: 72,
        help: true,
        prefixModule: true,
        prefixMainModule: false,
      });
    });

    it('rejects values that are not non-negative integers', () => {
      expect(() => parseTreeOptions({ treeDepth: '-1' })).toThrow(
        'Invalid --tree-depth value "-1". Expected a non-negative integer.'
      );
      expect(() => parseTreeOptions({ treeLineLength: '2.5' })).toThrow(
        ConfigError
      );
    });

    it('names the offending flag in the error context', () => {
      try {
        parseTreeOptions({ treeLineLength: 'wide' });
        expect.unreachable('parse should fail');
      } catch (error) {
        expect(error instanceof ConfigError && error.setting).toBe(
          '--tree-line-length'
        );
      }
    });
  });

  describe('parseModuleSpec', () => {
    it('accepts a bare module name', () => {
      expect(parseModuleSpec('example-server')).toEqual({
        name: 'example-server',
      });
    });

    it('splits off a revision', () => {
      expect(parseModuleSpec('example-server@2024-01-15')).toEqual({
        name: 'example-server',
        revision: '2024-01-15',
      });
    });

    it('rejects an empty name', () => {
      expect(() => parseModuleSpec('@2024-01-15')).toThrow(
        'Invalid --module value "@2024-01-15". Expected name or name@revision.'
      );
    });

    it('rejects a malformed revision', () => {
      expect(() => parseModuleSpec('m@2024-1-15')).toThrow(
        'Invalid revision "2024-1-15" in --module value "m@2024-1-15". Expected YYYY-MM-DD.'
      );
    });
  });

  describe('resolveLogLevel', () => {
    it('defaults to warn and switches to debug with --verbose', () => {
      expect(resolveLogLevel({})).toBe('warn');
      expect(resolveLogLevel({ verbose: true })).toBe('debug');
    });

    it('prefers an explicit --log-level', () => {
      expect(resolveLogLevel({ verbose: true, logLevel: 'ERROR' })).toBe(
        'error'
      );
    });

    it('rejects unknown levels', () => {
      expect(() => resolveLogLevel({ logLevel: 'loud' })).toThrow(ConfigError);
    });
  });

  describe('collect', () => {
    it('appends repeated values', () => {
      expect(collect('b', collect('a', []))).toEqual(['a', 'b']);
    });
  });
});
