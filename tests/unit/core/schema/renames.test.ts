import { describe, it } from 'node:test';
import assert from 'node:assert';
import { listNode, mapNode, scalarNode } from '../../../../src/types/config-tree.ts';
import { optionPath } from '../../../../src/types/branded.ts';
import { applyRenames } from '../../../../src/core/schema/renames.ts';
import { documentationRenames } from '../../../../src/core/documentation/options.ts';
import { encodeTree } from '../../../../src/core/tree/json-codec.ts';
import { settingsTree } from '../../../helpers/test-deps.ts';

describe('Option Renames', () => {
  it('should move a value from the old path to the new path', () => {
    const settings = settingsTree({ programs: { man: { enable: false } }, networking: { hostName: 'h' } });

    const result = applyRenames(settings, documentationRenames);

    assert.deepStrictEqual(encodeTree(result.settings), {
      documentation: { man: { enable: false } },
      networking: { hostName: 'h' },
    });
    assert.deepStrictEqual(result.warnings, [
      "The option 'programs.man.enable' has been renamed to 'documentation.man.enable'.",
    ]);
  });

  it('should keep sibling keys of the old path', () => {
    const settings = settingsTree({
      services: { nixosManual: { enable: false, showManual: true } },
    });

    const result = applyRenames(settings, documentationRenames);

    assert.deepStrictEqual(encodeTree(result.settings), {
      documentation: { nixos: { enable: false } },
      services: { nixosManual: { showManual: true } },
    });
  });

  it('should let the new path win when both are set', () => {
    const settings = settingsTree({
      programs: { info: { enable: false } },
      documentation: { info: { enable: true } },
    });

    const result = applyRenames(settings, documentationRenames);

    assert.deepStrictEqual(encodeTree(result.settings), { documentation: { info: { enable: true } } });
    assert.strictEqual(result.warnings.length, 1);
  });

  it('should concatenate list values from both paths', () => {
    const renames = [{ from: optionPath('old.items'), to: optionPath('new.items') }];
    const settings = mapNode({
      old: mapNode({ items: listNode([scalarNode('a')]) }),
      new: mapNode({ items: listNode([scalarNode('b')]) }),
    });

    const result = applyRenames(settings, renames);

    assert.deepStrictEqual(encodeTree(result.settings), { new: { items: ['a', 'b'] } });
  });

  it('should return the settings untouched when no old path is set', () => {
    const settings = settingsTree({ documentation: { enable: false } });

    const result = applyRenames(settings, documentationRenames);

    assert.strictEqual(result.settings, settings);
    assert.deepStrictEqual(result.warnings, []);
  });

  it('should ignore an old path that runs through a scalar', () => {
    const settings = settingsTree({ programs: { man: 'yes' } });

    const result = applyRenames(settings, documentationRenames);

    assert.strictEqual(result.settings, settings);
    assert.deepStrictEqual(result.warnings, []);
  });
});
