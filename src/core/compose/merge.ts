/**
 * Config Tree Merge
 *
 * フラグメント合成のためのツリーマージ
 */

import { listNode, mapNodeFromEntries, type ConfigTree, type MapNode } from '../../types/config-tree.ts';

/**
 * 2つのツリーをマージする
 *
 * マージ仕様:
 * - マップ同士: キーごとに再帰的にマージ（新しいキーは末尾に追加）
 * - リスト同士: lower の後ろに upper の要素を連結
 * - それ以外: upper が優先（スカラー・アーティファクトの上書き）
 *
 * どちらの入力も変更せず、変化のない部分木はそのまま共有する。
 *
 * @param lower - 先に適用された値
 * @param upper - 後から適用される値
 */
export function mergeTrees(lower: ConfigTree | undefined, upper: ConfigTree): ConfigTree {
  if (lower === undefined) {
    return upper;
  }

  if (lower.kind === 'map' && upper.kind === 'map') {
    return mergeMaps(lower, upper);
  }

  if (lower.kind === 'list' && upper.kind === 'list') {
    return listNode([...lower.items, ...upper.items]);
  }

  return upper;
}

/**
 * マップ同士のマージ（mergeTrees のマップ版）
 */
export function mergeMaps(lower: MapNode, upper: MapNode): MapNode {
  const merged = new Map<string, ConfigTree>(Object.entries(lower.entries));

  for (const [key, upperValue] of Object.entries(upper.entries)) {
    merged.set(key, mergeTrees(merged.get(key), upperValue));
  }

  return mapNodeFromEntries(merged);
}
