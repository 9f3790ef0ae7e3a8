/**
 * Option Schema Types
 *
 * 設定オプション宣言の型定義
 */

import type { z } from 'zod';
import type { OptionPath } from './branded.ts';
import type { ConfigTree } from './config-tree.ts';

/**
 * オプションの型
 *
 * `name` はドキュメント表示用の型名、`schema` は設定ファイル検証用のZodスキーマ
 */
export interface OptionType {
  readonly name: string;
  readonly schema: z.ZodType;
}

/**
 * オプションを宣言したモジュールの種類
 *
 * - 'base': 標準モジュール（常にドキュメント対象）
 * - 'user': ユーザーが追加したモジュール（includeAllModules 時のみ対象）
 */
export type OptionSource = 'base' | 'user';

/**
 * 設定オプションの宣言
 */
export interface OptionSpec {
  /** ドット区切りのパス（例: "documentation.man.enable"） */
  readonly path: OptionPath;
  readonly type: OptionType;
  /** デフォルト値（アーティファクトを含んでよい） */
  readonly default: ConfigTree;
  /** ドキュメント用の説明文 */
  readonly description: string;
  /** ドキュメント用の設定例 */
  readonly example?: ConfigTree;
  readonly declaredIn: OptionSource;
  /** 宣言元のモジュールファイル */
  readonly declarations: readonly string[];
}

/**
 * オプション名の変更
 *
 * 旧パスに設定された値は新パスへ移され、警告が出る
 */
export interface OptionRename {
  readonly from: OptionPath;
  readonly to: OptionPath;
}
