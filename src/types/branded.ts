/**
 * Branded Types for type-safe domain identifiers
 *
 * ドメイン識別子の型安全性を確保するためのBranded Types定義。
 * ドット区切りのオプションパスを素の文字列と区別する。
 */

declare const brand: unique symbol;
type Brand<K, T> = T & { readonly [brand]: K };

// オプション関連
export type OptionPath = Brand<'OptionPath', string>;

// コンストラクタ関数
export const optionPath = (raw: string): OptionPath => raw as OptionPath;

// アンラップ関数
export const unwrapOptionPath = (path: OptionPath): string => path as string;
