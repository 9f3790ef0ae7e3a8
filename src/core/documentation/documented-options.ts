/**
 * Documented Options
 *
 * マニュアルに載せるオプションの選択と、レンダラへ渡す形への変換
 */

import { createOk, isErr, type Result } from 'option-t/plain_result';
import {
  getBoolean,
  getListItems,
  joinKeyPath,
  placeholder,
  type ConfigTree,
} from '../../types/config-tree.ts';
import { unwrapOptionPath } from '../../types/branded.ts';
import type { StructuralError } from '../../types/errors.ts';
import type { ResolvedConfig } from '../../types/fragment.ts';
import type { OptionSpec } from '../../types/option.ts';
import type { OptionRegistry } from '../schema/registry.ts';
import { intrinsicOrPositionalName, scrub } from '../scrub/scrubber.ts';
import { encodeTree } from '../tree/json-codec.ts';
import { DocumentationPaths } from './options.ts';
import type { DocumentedOption } from './renderer.ts';

/**
 * ドキュメントから取り除くモジュールパスの接頭辞
 *
 * アーティファクトはプレースホルダの形で比較する
 */
export function extraModuleSources(resolved: ResolvedConfig): string[] {
  const keyPath = DocumentationPaths.nixosExtraModuleSources;
  const sources: string[] = [];

  for (const [index, item] of getListItems(resolved, keyPath).entries()) {
    if (item.kind === 'artifact') {
      sources.push(placeholder(intrinsicOrPositionalName(item, joinKeyPath(keyPath, String(index)))));
    } else if (item.kind === 'scalar' && typeof item.value === 'string') {
      sources.push(item.value);
    }
  }

  return sources;
}

/**
 * 宣言元のパスから接頭辞を取り除く
 *
 * 接頭辞はパスのセグメント単位で照合する（`/etc/mod` は `/etc/modules/...` に一致しない）
 */
export function stripSources(declarations: readonly string[], sources: readonly string[]): string[] {
  const bases = sources.map((prefix) => prefix.replace(/\/+$/, '')).filter((base) => base !== '');
  return declarations.map((declaration) => {
    const base = bases.find((candidate) => declaration.startsWith(`${candidate}/`));
    if (base === undefined) {
      return declaration;
    }
    return declaration.slice(base.length).replace(/^\/+/, '');
  });
}

/**
 * マニュアルに載せるオプションを選ぶ
 *
 * - includeAllModules が true: 登録済みの全オプション
 * - false: 標準モジュールで宣言されたオプションのみ
 * - extraDocModules のオプションはどちらの場合も含める
 */
export function selectOptions(
  registry: OptionRegistry,
  resolved: ResolvedConfig,
  extraDocModules: readonly OptionSpec[] = [],
): OptionSpec[] {
  const includeAll = getBoolean(resolved, DocumentationPaths.nixosIncludeAllModules);
  const selected = [...(includeAll ? registry.list() : registry.list({ declaredIn: 'base' }))];
  const seen = new Set(selected.map((spec) => unwrapOptionPath(spec.path)));

  for (const spec of extraDocModules) {
    const key = unwrapOptionPath(spec.path);
    if (!seen.has(key)) {
      seen.add(key);
      selected.push(spec);
    }
  }

  return selected;
}

const scrubValue = (value: ConfigTree, rootName: string): Result<unknown, StructuralError> => {
  const scrubbed = scrub(value, { rootName });
  if (isErr(scrubbed)) {
    return scrubbed;
  }
  return createOk(encodeTree(scrubbed.val));
};

/**
 * オプション宣言をレンダラ向けの形へ変換
 *
 * default / example に含まれるアーティファクトはプレースホルダに置き換わる
 */
export function toDocumentedOptions(
  specs: readonly OptionSpec[],
  sources: readonly string[],
): Result<DocumentedOption[], StructuralError> {
  const documented: DocumentedOption[] = [];

  for (const spec of specs) {
    const name = unwrapOptionPath(spec.path);

    const defaultValue = scrubValue(spec.default, name);
    if (isErr(defaultValue)) {
      return defaultValue;
    }

    let example: unknown;
    if (spec.example !== undefined) {
      const scrubbedExample = scrubValue(spec.example, name);
      if (isErr(scrubbedExample)) {
        return scrubbedExample;
      }
      example = scrubbedExample.val;
    }

    documented.push({
      name,
      type: spec.type.name,
      description: spec.description,
      default: defaultValue.val,
      ...(example === undefined ? {} : { example }),
      declarations: stripSources(spec.declarations, sources),
    });
  }

  return createOk(documented);
}
