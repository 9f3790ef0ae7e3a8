/**
 * Documentation Assembly
 *
 * ユーザー設定とパッケージセットから合成済み設定を作り、
 * プレースホルダ化したうえでマニュアルレンダラへ渡す。
 *
 * 処理の流れ:
 * 1. 旧オプション名の値を新しい名前へ移す
 * 2. スキーマのデフォルトにユーザー設定を重ねてベースを作る
 * 3. documentation.* のフラグメントを合成（アサーション失敗時はここで終了）
 * 4. インストール指示を導出
 * 5. 合成済み設定とオプションのデフォルト値をプレースホルダ化
 * 6. documentation.enable と documentation.nixos.enable が有効ならレンダラを呼ぶ
 */

import { createOk, isErr, type Result } from 'option-t/plain_result';
import { getBoolean, type ConfigTree, type MapNode } from '../../types/config-tree.ts';
import type { CompositionError, DocumentationError } from '../../types/errors.ts';
import type { CompositionResult } from '../../types/fragment.ts';
import type { OptionRename, OptionSpec } from '../../types/option.ts';
import type { Logger } from '../../adapters/logger/logger.ts';
import { compose } from '../compose/composer.ts';
import { mergeMaps } from '../compose/merge.ts';
import type { OptionRegistry } from '../schema/registry.ts';
import { applyRenames } from '../schema/renames.ts';
import { scrub } from '../scrub/scrubber.ts';
import { encodeTree } from '../tree/json-codec.ts';
import { extraModuleSources, selectOptions, toDocumentedOptions } from './documented-options.ts';
import { createDocumentationFragments, type ManualOutputs } from './fragments.ts';
import { deriveInstallDirectives, type InstallDirectives } from './install-directives.ts';
import { DocumentationPaths, documentationRenames } from './options.ts';
import type { DocumentedOption, ManualRenderer, RenderedManual } from './renderer.ts';

export interface ResolutionInput {
  readonly registry: OptionRegistry;
  /** ユーザー設定 */
  readonly settings: MapNode;
  /** パッケージセット（アーティファクトを含む） */
  readonly packages: ConfigTree;
  /** 既定は documentation.* の改名定義 */
  readonly renames?: readonly OptionRename[];
}

export interface AssemblyInput extends ResolutionInput {
  /** リリース番号（例: "24.05"） */
  readonly release: string;
  /** 読み込まれていなくてもマニュアルに載せるオプション */
  readonly extraDocModules?: readonly OptionSpec[];
}

export interface AssemblyDeps {
  readonly renderer: ManualRenderer;
  readonly logger: Logger;
}

export interface DocumentationOutput {
  readonly composition: CompositionResult;
  readonly directives: InstallDirectives;
  /** プレースホルダ化済みの合成済み設定（JSON値） */
  readonly scrubbedConfig: unknown;
  readonly options: readonly DocumentedOption[];
  /** レンダラを呼ばなかった場合は null */
  readonly manual: RenderedManual | null;
  readonly warnings: readonly string[];
}

export interface ResolvedDocumentation {
  readonly composition: CompositionResult;
  readonly directives: InstallDirectives;
  readonly warnings: readonly string[];
}

/**
 * 設定を合成してインストール指示を導出する（手順1〜4）
 *
 * @param manual - system.build.manual 等に配置するマニュアルの成果物
 */
export function resolveDocumentation(
  input: ResolutionInput,
  manual: ManualOutputs,
  logger: Logger,
): Result<ResolvedDocumentation, CompositionError> {
  const renamed = applyRenames(input.settings, input.renames ?? documentationRenames);
  for (const warning of renamed.warnings) {
    logger.warn(warning);
  }

  const base = mergeMaps(input.registry.defaults(), renamed.settings);
  const fragments = createDocumentationFragments(base, input.packages, manual);

  const composed = compose(base, fragments);
  if (isErr(composed)) {
    return composed;
  }

  const composition = composed.val;
  logger.info(`Active fragments: ${composition.active.join(', ') || '(none)'}`);

  return createOk({
    composition,
    directives: deriveInstallDirectives(composition.resolved),
    warnings: renamed.warnings,
  });
}

/**
 * ドキュメント生成パスを実行する
 */
export async function assembleDocumentation(
  input: AssemblyInput,
  deps: AssemblyDeps,
): Promise<Result<DocumentationOutput, DocumentationError>> {
  const { renderer, logger } = deps;

  const resolution = resolveDocumentation(input, renderer.outputs(), logger);
  if (isErr(resolution)) {
    return resolution;
  }

  const { composition, directives, warnings } = resolution.val;
  const { resolved } = composition;

  const scrubbed = scrub(resolved);
  if (isErr(scrubbed)) {
    return scrubbed;
  }
  const scrubbedConfig = encodeTree(scrubbed.val);

  const selected = selectOptions(input.registry, resolved, input.extraDocModules);
  const documented = toDocumentedOptions(selected, extraModuleSources(resolved));
  if (isErr(documented)) {
    return documented;
  }
  const options = documented.val;

  const shouldRender =
    getBoolean(resolved, DocumentationPaths.enable) && getBoolean(resolved, DocumentationPaths.nixosEnable);

  let manual: RenderedManual | null = null;
  if (shouldRender) {
    logger.info(`Rendering manual with ${options.length} options`);
    const rendered = await renderer.render({
      release: input.release,
      revision: `release-${input.release}`,
      options,
      config: scrubbedConfig,
    });
    if (isErr(rendered)) {
      return rendered;
    }
    manual = rendered.val;
  }

  return createOk({
    composition,
    directives,
    scrubbedConfig,
    options,
    manual,
    warnings,
  });
}
