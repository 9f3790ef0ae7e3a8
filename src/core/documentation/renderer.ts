/**
 * Manual Renderer Interface
 *
 * プレースホルダ化済みのオプション一覧から人間向けのマニュアルを作る外部コンポーネント。
 * レンダラはアーティファクトを受け取らず、プレースホルダを解決しようとしてもいけない。
 */

import type { Result } from 'option-t/plain_result';
import type { RenderError } from '../../types/errors.ts';
import type { ManualOutputs } from './fragments.ts';

/**
 * ドキュメント化されるオプション
 *
 * default / example はプレースホルダ化済みのJSON値
 */
export interface DocumentedOption {
  readonly name: string;
  readonly type: string;
  readonly description: string;
  readonly default: unknown;
  readonly example?: unknown;
  readonly declarations: readonly string[];
}

export interface ManualInput {
  readonly release: string;
  /** 例: "release-24.05" */
  readonly revision: string;
  readonly options: readonly DocumentedOption[];
  /** プレースホルダ化済みの合成済み設定（JSON値） */
  readonly config: unknown;
}

export interface RenderedManual {
  /** 書き出したファイルの絶対パス */
  readonly files: readonly string[];
}

export interface ManualRenderer {
  /**
   * レンダリング結果を指すアーティファクト
   *
   * 合成時に system.build.manual 等へ配置される。realize されるまで何も生成しない。
   */
  outputs(): ManualOutputs;

  /**
   * マニュアルを生成する
   */
  render(input: ManualInput): Promise<Result<RenderedManual, RenderError>>;
}
