/**
 * Public exports
 *
 * 設定ツリー、スクラバ、コンポーザ、オプションレジストリ、ドキュメント生成パス
 */

// Types
export * from './types/config-tree.ts';
export * from './types/errors.ts';
export * from './types/branded.ts';
export type * from './types/option.ts';
export type * from './types/fragment.ts';

// Core
export * from './core/scrub/scrubber.ts';
export * from './core/compose/merge.ts';
export * from './core/compose/composer.ts';
export * from './core/tree/json-codec.ts';
export * from './core/schema/option-types.ts';
export * from './core/schema/registry.ts';
export * from './core/schema/renames.ts';

// Documentation
export * from './core/documentation/options.ts';
export * from './core/documentation/fragments.ts';
export * from './core/documentation/install-directives.ts';
export * from './core/documentation/documented-options.ts';
export type * from './core/documentation/renderer.ts';
export * from './core/documentation/assembly.ts';

// Adapters
export * from './adapters/logger/logger.ts';
export * from './adapters/renderer/options-json-renderer.ts';
