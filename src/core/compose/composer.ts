/**
 * Conditional Fragment Composer
 *
 * 条件付きフラグメントを宣言順にベースツリーへ重ね、
 * 有効なフラグメントのアサーションをすべて検査する。
 */

import { createErr, createOk, type Result } from 'option-t/plain_result';
import { frozenMapCopy, type MapNode } from '../../types/config-tree.ts';
import type { AssertionFailure, CompositionError } from '../../types/errors.ts';
import { compositionError } from '../../types/errors.ts';
import type {
  CompositionResult,
  Fragment,
  FragmentAssertion,
  FragmentPredicate,
} from '../../types/fragment.ts';
import { mergeMaps } from './merge.ts';

/**
 * 常に有効なフラグメント用の述語
 */
export const always: FragmentPredicate = () => true;

/**
 * フラグメントを作成
 */
export function fragment(
  name: string,
  payload: MapNode,
  options: { when?: FragmentPredicate; assertions?: readonly FragmentAssertion[] } = {},
): Fragment {
  return {
    name,
    predicate: options.when ?? always,
    payload,
    assertions: options.assertions ?? [],
  };
}

/**
 * 述語を AND で結合する
 *
 * 外側の条件（例: documentation.enable）を各フラグメントに掛けるときに使う
 */
export function guardFragment(guard: FragmentPredicate, target: Fragment): Fragment {
  return {
    ...target,
    predicate: (base) => guard(base) && target.predicate(base),
  };
}

/**
 * フラグメントを合成する
 *
 * 1. 各フラグメントの述語をベースに対して一度だけ評価
 * 2. 有効なフラグメントを宣言順にマージ
 * 3. 有効なフラグメントの全アサーションを宣言順に検査（途中で打ち切らない）
 * 4. 1件でも失敗すれば CompositionError、成功すれば凍結済みの合成結果
 *
 * @param base - スキーマのデフォルトにユーザー設定を重ねたツリー
 * @param fragments - 宣言順のフラグメント
 */
export function compose(
  base: MapNode,
  fragments: readonly Fragment[],
): Result<CompositionResult, CompositionError> {
  const active: Fragment[] = [];
  const inactive: Fragment[] = [];

  for (const item of fragments) {
    if (item.predicate(base)) {
      active.push(item);
    } else {
      inactive.push(item);
    }
  }

  let resolved: MapNode = base;
  for (const item of active) {
    resolved = mergeMaps(resolved, item.payload);
  }

  const failures: AssertionFailure[] = [];
  for (const item of active) {
    for (const assertion of item.assertions) {
      if (!assertion.check(resolved)) {
        failures.push({ fragment: item.name, message: assertion.message });
      }
    }
  }

  if (failures.length > 0) {
    return createErr(compositionError(failures));
  }

  return createOk({
    resolved: frozenMapCopy(resolved),
    active: active.map((item) => item.name),
    inactive: inactive.map((item) => item.name),
  });
}
