/**
 * Layered Settings Types
 *
 * 階層化されたユーザー設定ファイルの型定義
 */

import type { MapNode } from './config-tree.ts';

/**
 * 設定階層
 *
 * 優先度: project (2) > global (1)
 */
export type SettingsLayer = 'global' | 'project';

/**
 * 階層ごとの設定ファイルパス
 */
export interface SettingsLayerPaths {
  readonly global: string;
  readonly project: string;
}

/**
 * 設定ファイルの読み込み結果（検証前）
 */
export interface RawSettingsFile {
  readonly layer: SettingsLayer;
  /** 設定ファイルの絶対パス */
  readonly filePath: string;
  /** ファイルが存在したか */
  readonly exists: boolean;
  /** JSON.parse の結果 */
  readonly data: unknown;
}

/**
 * 階層化設定の読み込み結果
 */
export interface LoadedSettings {
  /** マージ済み設定 */
  readonly settings: MapNode;
  /** 実際に読み込んだファイル（下位優先度から順） */
  readonly sources: readonly { readonly layer: SettingsLayer; readonly filePath: string }[];
}
