/**
 * Option Schema Registry
 *
 * オプション宣言の登録と、そこから導出されるデフォルトツリー・検証スキーマ
 */

import { z } from 'zod';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { mapNode, treeAt, type MapNode } from '../../types/config-tree.ts';
import type { OptionPath } from '../../types/branded.ts';
import { optionPath, unwrapOptionPath } from '../../types/branded.ts';
import type { ConfigValidationError } from '../../types/errors.ts';
import { configValidationError } from '../../types/errors.ts';
import type { OptionSource, OptionSpec } from '../../types/option.ts';
import { mergeMaps } from '../compose/merge.ts';

/**
 * オプション宣言を作成
 *
 * パスは文字列で受け取り、OptionPath に変換する
 */
export function defineOption(
  spec: Omit<OptionSpec, 'path' | 'declaredIn' | 'declarations'> & {
    path: string;
    declaredIn?: OptionSource;
    declarations?: readonly string[];
  },
): OptionSpec {
  return {
    ...spec,
    path: optionPath(spec.path),
    declaredIn: spec.declaredIn ?? 'base',
    declarations: spec.declarations ?? [],
  };
}

export interface OptionRegistry {
  /** パスでオプションを取得 */
  get(path: OptionPath | string): OptionSpec | undefined;
  /** 宣言順にオプションを列挙（declaredIn 指定時は絞り込む） */
  list(filter?: { declaredIn?: OptionSource }): readonly OptionSpec[];
  /** 全オプションのデフォルト値からなるツリー */
  defaults(): MapNode;
  /** 設定ファイル検証用のスキーマ（全オプション省略可、未知のキーは許容） */
  settingsSchema(): z.ZodType;
}

/**
 * 入れ子のスキーマ構築用の中間表現
 */
interface GroupShape {
  readonly kind: 'group';
  readonly children: Map<string, SchemaShape>;
}

type SchemaShape = GroupShape | { readonly kind: 'leaf'; readonly schema: z.ZodType };

function shapeToSchema(shape: SchemaShape): z.ZodType {
  if (shape.kind === 'leaf') {
    return shape.schema;
  }
  const fields: Record<string, z.ZodType> = {};
  for (const [key, child] of shape.children) {
    fields[key] = shapeToSchema(child).optional();
  }
  return z.looseObject(fields);
}

/**
 * オプションレジストリを作成
 *
 * 同じパスのオプションが二重に宣言されている場合や、
 * あるオプションが別のオプションの親パスになっている場合はエラー
 */
export function createOptionRegistry(
  specs: readonly OptionSpec[],
): Result<OptionRegistry, ConfigValidationError> {
  const byPath = new Map<string, OptionSpec>();

  for (const spec of specs) {
    const key = unwrapOptionPath(spec.path);
    if (byPath.has(key)) {
      return createErr(configValidationError(`option ${key} is declared more than once`));
    }
    byPath.set(key, spec);
  }

  for (const key of byPath.keys()) {
    for (const other of byPath.keys()) {
      if (other.startsWith(`${key}.`)) {
        return createErr(configValidationError(`option ${key} conflicts with nested option ${other}`));
      }
    }
  }

  const ordered = [...byPath.values()];

  const registry: OptionRegistry = {
    get: (path) => byPath.get(path),

    list: (filter) =>
      filter?.declaredIn === undefined
        ? ordered
        : ordered.filter((spec) => spec.declaredIn === filter.declaredIn),

    defaults: () => {
      let tree = mapNode();
      for (const spec of ordered) {
        const leaf = treeAt(unwrapOptionPath(spec.path), spec.default);
        if (leaf.kind === 'map') {
          tree = mergeMaps(tree, leaf);
        }
      }
      return tree;
    },

    settingsSchema: () => {
      const root: GroupShape = { kind: 'group', children: new Map() };
      for (const spec of ordered) {
        const parts = unwrapOptionPath(spec.path).split('.');
        const leafKey = parts.pop();
        if (leafKey === undefined) continue;

        let current: GroupShape = root;
        for (const part of parts) {
          const next = current.children.get(part);
          if (next?.kind === 'group') {
            current = next;
          } else {
            const created: GroupShape = { kind: 'group', children: new Map() };
            current.children.set(part, created);
            current = created;
          }
        }
        current.children.set(leafKey, { kind: 'leaf', schema: spec.type.schema });
      }
      return shapeToSchema(root);
    },
  };

  return createOk(registry);
}
