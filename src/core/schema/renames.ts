/**
 * Option Renames
 *
 * 改名されたオプションの旧パスに書かれた値を新パスへ移す
 */

import { mapNodeFromEntries, ownEntry, treeAt, type ConfigTree, type MapNode } from '../../types/config-tree.ts';
import { unwrapOptionPath } from '../../types/branded.ts';
import type { OptionRename } from '../../types/option.ts';
import { mergeMaps } from '../compose/merge.ts';

export interface RenameResult {
  readonly settings: MapNode;
  /** 移動した値ごとの警告メッセージ */
  readonly warnings: readonly string[];
}

/**
 * 指定パスの値を取り除く
 *
 * 取り除いた結果空になったマップも取り除く
 */
function detach(tree: MapNode, parts: readonly string[]): { tree: MapNode; value: ConfigTree | undefined } {
  const [head, ...rest] = parts;
  if (head === undefined) {
    return { tree, value: undefined };
  }

  const child = ownEntry(tree, head);
  if (child === undefined) {
    return { tree, value: undefined };
  }

  const entries = new Map<string, ConfigTree>(Object.entries(tree.entries));

  if (rest.length === 0) {
    entries.delete(head);
    return { tree: mapNodeFromEntries(entries), value: child };
  }

  if (child.kind !== 'map') {
    return { tree, value: undefined };
  }

  const inner = detach(child, rest);
  if (inner.value === undefined) {
    return { tree, value: undefined };
  }

  if (Object.keys(inner.tree.entries).length === 0) {
    entries.delete(head);
  } else {
    entries.set(head, inner.tree);
  }
  return { tree: mapNodeFromEntries(entries), value: inner.value };
}

/**
 * 改名されたオプションを新しいパスへ移す
 *
 * 旧パスと新パスの両方に値がある場合は通常のマージ規則に従う
 * （スカラーは新パスが優先、リストは旧パスの要素の後ろに新パスの要素が続く）
 */
export function applyRenames(settings: MapNode, renames: readonly OptionRename[]): RenameResult {
  let current = settings;
  const warnings: string[] = [];

  for (const rename of renames) {
    const from = unwrapOptionPath(rename.from);
    const to = unwrapOptionPath(rename.to);

    const { tree, value } = detach(current, from.split('.'));
    if (value === undefined) {
      continue;
    }

    warnings.push(`The option '${from}' has been renamed to '${to}'.`);

    const moved = treeAt(to, value);
    current = moved.kind === 'map' ? mergeMaps(moved, tree) : tree;
  }

  return { settings: current, warnings };
}
