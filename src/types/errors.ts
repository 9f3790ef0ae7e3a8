/**
 * Domain Error Types
 *
 * ドメインエラーの型定義。option-tのResult型と組み合わせて使用する。
 * タグ付きユニオン型により、エラーの種類を型安全に区別できる。
 */

// ===== Structural Errors =====

export type StructuralErrorReason = 'cycle' | 'unnamed-artifact';

/**
 * 入力ツリーの構造不正（循環参照、名前を持たないアーティファクト）
 */
export interface StructuralError {
  readonly type: 'StructuralError';
  readonly reason: StructuralErrorReason;
  /** 問題が見つかったツリー上の位置（ドット区切り、ルートは空文字列） */
  readonly path: string;
  readonly message: string;
}

const displayPath = (path: string): string => (path === '' ? '<root>' : path);

export const cyclicTree = (path: string): StructuralError => ({
  type: 'StructuralError',
  reason: 'cycle',
  path,
  message: `Cyclic reference detected in configuration tree at ${displayPath(path)}`,
});

export const unnamedArtifact = (path: string): StructuralError => ({
  type: 'StructuralError',
  reason: 'unnamed-artifact',
  path,
  message: `Artifact at ${displayPath(path)} cannot report an identity`,
});

// ===== Composition Errors =====

/**
 * 失敗したアサーション
 */
export interface AssertionFailure {
  /** アサーションを持っていたフラグメント名 */
  readonly fragment: string;
  readonly message: string;
}

/**
 * 有効なフラグメントのアサーションが1つ以上失敗した
 *
 * 最初の1件ではなく、失敗した全アサーションを保持する
 */
export interface CompositionError {
  readonly type: 'CompositionError';
  readonly failures: readonly AssertionFailure[];
  readonly message: string;
}

export const compositionError = (failures: readonly AssertionFailure[]): CompositionError => ({
  type: 'CompositionError',
  failures,
  message: `Failed assertions:\n${failures.map((failure) => `- ${failure.message}`).join('\n')}`,
});

// ===== Config Errors =====

export type ConfigError = ConfigParseError | ConfigValidationError | TreeDecodeError;

export interface ConfigParseError {
  readonly type: 'ConfigParseError';
  readonly filePath: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface ConfigValidationError {
  readonly type: 'ConfigValidationError';
  readonly filePath?: string;
  readonly details: string;
  readonly message: string;
}

/**
 * JSONから設定ツリーへの変換に失敗した
 */
export interface TreeDecodeError {
  readonly type: 'TreeDecodeError';
  readonly path: string;
  readonly details: string;
  readonly message: string;
}

// ConfigError コンストラクタ
export const configParseError = (filePath: string, cause?: unknown): ConfigParseError => ({
  type: 'ConfigParseError',
  filePath,
  cause,
  message: `Failed to parse configuration file: ${filePath}${cause instanceof Error ? `\n${cause.message}` : ''}`,
});

export const configValidationError = (details: string, filePath?: string): ConfigValidationError => ({
  type: 'ConfigValidationError',
  filePath,
  details,
  message: `Configuration validation failed${filePath ? ` (${filePath})` : ''}: ${details}`,
});

export const treeDecodeError = (path: string, details: string): TreeDecodeError => ({
  type: 'TreeDecodeError',
  path,
  details,
  message: `Cannot decode value at ${displayPath(path)}: ${details}`,
});

// ===== Render Errors =====

export interface RenderError {
  readonly type: 'RenderError';
  readonly cause?: unknown;
  readonly message: string;
}

export const renderError = (cause?: unknown): RenderError => ({
  type: 'RenderError',
  cause,
  message: `Manual rendering failed: ${cause instanceof Error ? cause.message : String(cause)}`,
});

// ===== Documentation Errors =====

export type DocumentationError = StructuralError | CompositionError | ConfigError | RenderError;
