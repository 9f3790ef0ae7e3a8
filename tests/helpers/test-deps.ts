/**
 * 共通テスト用のアーティファクト・ロガー・レンダラ
 */

import assert from 'node:assert';
import { createErr, createOk, isOk } from 'option-t/plain_result';
import { artifactNode, type ArtifactNode, type MapNode } from '../../src/types/config-tree.ts';
import { renderError } from '../../src/types/errors.ts';
import { mergeMaps } from '../../src/core/compose/merge.ts';
import { createOptionRegistry, type OptionRegistry } from '../../src/core/schema/registry.ts';
import { decodeTree } from '../../src/core/tree/json-codec.ts';
import { allDocumentationOptions } from '../../src/core/documentation/options.ts';
import type { Logger } from '../../src/adapters/logger/logger.ts';
import type { ManualOutputs } from '../../src/core/documentation/fragments.ts';
import type { ManualInput, ManualRenderer } from '../../src/core/documentation/renderer.ts';

/**
 * documentation.* を登録したレジストリ
 */
export function documentationRegistry(): OptionRegistry {
  const registry = createOptionRegistry(allDocumentationOptions);
  assert.ok(isOk(registry), 'Registry should be valid');
  return registry.val;
}

/**
 * JSONの値から設定ツリー（マップ）を作る
 */
export function settingsTree(value: unknown): MapNode {
  const decoded = decodeTree(value);
  assert.ok(isOk(decoded), 'Settings should decode');
  assert.ok(decoded.val.kind === 'map', 'Settings should be a map');
  return decoded.val;
}

/**
 * デフォルトにユーザー設定を重ねたベースツリー
 */
export function documentationBase(settings: unknown = {}): MapNode {
  return mergeMaps(documentationRegistry().defaults(), settingsTree(settings));
}

/**
 * realize の呼び出し回数を数えるアーティファクト
 */
export interface TrackedArtifact {
  readonly node: ArtifactNode;
  realizeCalls(): number;
}

export function trackedArtifact(name?: string): TrackedArtifact {
  let calls = 0;
  const node = artifactNode(() => {
    calls++;
    return `/store/${name ?? 'unnamed'}`;
  }, name);
  return { node, realizeCalls: () => calls };
}

/**
 * 出力を記録するロガー
 */
export interface RecordingLogger extends Logger {
  readonly infos: string[];
  readonly warnings: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (message) => {
      infos.push(message);
    },
    warn: (message) => {
      warnings.push(message);
    },
  };
}

/**
 * 受け取った入力を記録するレンダラ
 */
export interface FakeRenderer extends ManualRenderer {
  readonly inputs: ManualInput[];
}

const unbuilt = (name: string): ArtifactNode =>
  artifactNode(() => {
    throw new Error(`${name} must not be realized`);
  }, name);

export function createFakeRenderer(options: { fail?: boolean } = {}): FakeRenderer {
  const inputs: ManualInput[] = [];
  const outputs: ManualOutputs = {
    manpages: unbuilt('system.build.manual.manpages'),
    manualHTML: unbuilt('system.build.manual.manualHTML'),
    manualHTMLIndex: unbuilt('system.build.manual.manualHTMLIndex'),
    optionsJSON: unbuilt('system.build.manual.optionsJSON'),
    nixosHelp: unbuilt('nixos-help'),
  };

  return {
    inputs,
    outputs: () => outputs,
    render: async (input) => {
      inputs.push(input);
      if (options.fail) {
        return createErr(renderError(new Error('disk full')));
      }
      return createOk({ files: ['/fake/options.json'] });
    },
  };
}
