/**
 * Fragment Types
 *
 * 条件付き設定フラグメントの型定義
 */

import type { ConfigTree, MapNode } from './config-tree.ts';

/**
 * フラグメントが有効かどうかの判定
 *
 * 合成のベースツリー（デフォルト + ユーザー設定）を受け取る。
 * 副作用を持たず、同じベースに対して常に同じ結果を返すこと。
 */
export type FragmentPredicate = (base: ConfigTree) => boolean;

/**
 * フラグメントに付随するアサーション
 *
 * `check` はマージ済みのツリーを受け取り、falseを返すと `message` が報告される
 */
export interface FragmentAssertion {
  readonly check: (resolved: ConfigTree) => boolean;
  readonly message: string;
}

/**
 * 独立して記述される条件付き設定フラグメント
 */
export interface Fragment {
  /** ログ・エラー表示用の名前 */
  readonly name: string;
  readonly predicate: FragmentPredicate;
  readonly payload: MapNode;
  readonly assertions: readonly FragmentAssertion[];
}

/**
 * 合成済み設定（読み取り専用）
 */
export type ResolvedConfig = MapNode;

/**
 * 合成結果
 */
export interface CompositionResult {
  readonly resolved: ResolvedConfig;
  /** 有効だったフラグメント名（宣言順） */
  readonly active: readonly string[];
  /** 無効だったフラグメント名（宣言順） */
  readonly inactive: readonly string[];
}
