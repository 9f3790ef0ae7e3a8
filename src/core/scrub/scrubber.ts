/**
 * Artifact Scrubber
 *
 * 設定ツリー中のアーティファクト（ビルド成果物）を `${論理パス}` 形式の
 * プレースホルダへ置き換えた、構造が同一のツリーを作る。
 * アーティファクトの中身は名前の取得以外では一切参照しない。
 */

import { createErr, createOk, isErr, type Result } from 'option-t/plain_result';
import {
  joinKeyPath,
  mapNodeFromEntries,
  listNode,
  placeholder,
  scalarNode,
  type ConfigTree,
} from '../../types/config-tree.ts';
import type { StructuralError } from '../../types/errors.ts';
import { cyclicTree, unnamedArtifact } from '../../types/errors.ts';

/**
 * アーティファクト判定
 *
 * @param node 判定対象のノード
 * @param path ノードの位置（ドット区切り）
 */
export type ArtifactPredicate = (node: ConfigTree, path: string) => boolean;

/**
 * アーティファクトの論理名を決める関数
 *
 * 空文字列を返した場合は名前を報告できないものとして扱う
 */
export type ArtifactNamer = (node: ConfigTree, path: string) => string;

export interface ScrubOptions {
  /** アーティファクト判定（既定: kind === 'artifact'） */
  readonly isArtifact?: ArtifactPredicate;
  /** 論理名の決定（既定: 自己申告名、なければツリー上の位置） */
  readonly nameOf?: ArtifactNamer;
  /** ルートの論理名（例: "pkgs"） */
  readonly rootName?: string;
}

export const isArtifactKind: ArtifactPredicate = (node) => node.kind === 'artifact';

/**
 * 既定の命名規則
 *
 * 自己申告の名前があればそれを、なければツリー上の位置を使う
 */
export const intrinsicOrPositionalName: ArtifactNamer = (node, path) =>
  node.kind === 'artifact' && node.name ? node.name : path;

/**
 * アーティファクトをプレースホルダに置き換える
 *
 * map と list を深さ優先で辿る。入力は変更しない。
 *
 * @returns 置換済みツリー。循環参照や名前のないアーティファクトがあればStructuralError
 */
export function scrub(tree: ConfigTree, options: ScrubOptions = {}): Result<ConfigTree, StructuralError> {
  const isArtifact = options.isArtifact ?? isArtifactKind;
  const nameOf = options.nameOf ?? intrinsicOrPositionalName;

  // 現在の経路上にあるノード（共有された部分木は循環とみなさない）
  const ancestors = new Set<ConfigTree>();

  const visit = (node: ConfigTree, path: string): Result<ConfigTree, StructuralError> => {
    if (isArtifact(node, path)) {
      const name = nameOf(node, path);
      if (!name) {
        return createErr(unnamedArtifact(path));
      }
      return createOk(scalarNode(placeholder(name)));
    }

    if (node.kind !== 'map' && node.kind !== 'list') {
      return createOk(node);
    }

    if (ancestors.has(node)) {
      return createErr(cyclicTree(path));
    }
    ancestors.add(node);

    try {
      if (node.kind === 'map') {
        const entries: [string, ConfigTree][] = [];
        for (const [key, child] of Object.entries(node.entries)) {
          const result = visit(child, joinKeyPath(path, key));
          if (isErr(result)) {
            return result;
          }
          entries.push([key, result.val]);
        }
        return createOk(mapNodeFromEntries(entries));
      }

      const items: ConfigTree[] = [];
      for (const [index, item] of node.items.entries()) {
        const result = visit(item, joinKeyPath(path, String(index)));
        if (isErr(result)) {
          return result;
        }
        items.push(result.val);
      }
      return createOk(listNode(items));
    } finally {
      ancestors.delete(node);
    }
  };

  return visit(tree, options.rootName ?? '');
}
