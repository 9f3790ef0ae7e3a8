/**
 * Layered Settings Utilities
 *
 * グローバル設定とプロジェクト設定を読み込み、検証してマージする
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { createErr, createOk, isErr, type Result } from 'option-t/plain_result';
import { mapNode, type ConfigTree, type MapNode } from '../../types/config-tree.ts';
import type { ConfigError } from '../../types/errors.ts';
import { configParseError, configValidationError } from '../../types/errors.ts';
import type {
  LoadedSettings,
  RawSettingsFile,
  SettingsLayer,
  SettingsLayerPaths,
} from '../../types/settings-layer.ts';
import { mergeMaps } from '../../core/compose/merge.ts';
import type { OptionRegistry } from '../../core/schema/registry.ts';
import { decodeTree } from '../../core/tree/json-codec.ts';

export const SETTINGS_DIR_NAME = '.docs-compose';
export const SETTINGS_FILE_NAME = 'settings.json';

/**
 * 階層ごとの設定ファイルパスを解決
 *
 * グローバル設定は XDG Base Directory 仕様に従い ~/.config/docs-compose/ に置く
 *
 * @param projectRoot - プロジェクトルート（省略時はprocess.cwd()）
 */
export function resolveSettingsLayerPaths(projectRoot?: string): SettingsLayerPaths {
  const cwd = projectRoot ?? process.cwd();
  const configHome = process.env['XDG_CONFIG_HOME'] || path.join(os.homedir(), '.config');

  return {
    global: path.join(configHome, 'docs-compose', SETTINGS_FILE_NAME),
    project: path.join(cwd, SETTINGS_DIR_NAME, SETTINGS_FILE_NAME),
  };
}

/**
 * JSONファイルを読み込む（存在しない場合は exists: false）
 */
export async function readJsonFile(
  layer: SettingsLayer,
  filePath: string,
): Promise<Result<RawSettingsFile, ConfigError>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return createOk({ layer, filePath, exists: false, data: null });
    }
    return createErr(configParseError(filePath, error));
  }

  try {
    const data: unknown = JSON.parse(content);
    return createOk({ layer, filePath, exists: true, data });
  } catch (error) {
    return createErr(configParseError(filePath, error));
  }
}

/**
 * 読み込んだ値を検証して設定ツリーへ変換
 */
export function decodeSettings(
  registry: OptionRegistry,
  data: unknown,
  filePath: string,
): Result<MapNode, ConfigError> {
  const validated = registry.settingsSchema().safeParse(data);
  if (!validated.success) {
    return createErr(configValidationError(validated.error.message, filePath));
  }

  const decoded = decodeTree(data);
  if (isErr(decoded)) {
    return createErr(configValidationError(decoded.err.message, filePath));
  }

  return toMapNode(decoded.val, filePath);
}

function toMapNode(tree: ConfigTree, filePath: string): Result<MapNode, ConfigError> {
  if (tree.kind !== 'map') {
    return createErr(configValidationError('settings must be a JSON object', filePath));
  }
  return createOk(tree);
}

/**
 * 単一の設定ファイルを読み込む
 *
 * 存在しない場合はエラー
 */
export async function loadSettingsFile(
  registry: OptionRegistry,
  filePath: string,
): Promise<Result<LoadedSettings, ConfigError>> {
  const absolutePath = path.resolve(filePath);
  const file = await readJsonFile('project', absolutePath);
  if (isErr(file)) {
    return file;
  }

  if (!file.val.exists) {
    return createErr(configParseError(absolutePath, new Error('file not found')));
  }

  const settings = decodeSettings(registry, file.val.data, absolutePath);
  if (isErr(settings)) {
    return settings;
  }

  return createOk({
    settings: settings.val,
    sources: [{ layer: 'project', filePath: absolutePath }],
  });
}

/**
 * 階層化設定を読み込む
 *
 * global → project の順にマージする（スカラーは上位優先、リストは連結）。
 * 存在しないファイルは読み飛ばす。
 *
 * @param projectRoot - プロジェクトルート（省略時はprocess.cwd()）
 */
export async function loadLayeredSettings(
  registry: OptionRegistry,
  projectRoot?: string,
): Promise<Result<LoadedSettings, ConfigError>> {
  const paths = resolveSettingsLayerPaths(projectRoot);

  const files = await Promise.all([
    readJsonFile('global', paths.global),
    readJsonFile('project', paths.project),
  ]);

  let settings = mapNode();
  const sources: { layer: SettingsLayer; filePath: string }[] = [];

  for (const file of files) {
    if (isErr(file)) {
      return file;
    }
    if (!file.val.exists) {
      continue;
    }

    const decoded = decodeSettings(registry, file.val.data, file.val.filePath);
    if (isErr(decoded)) {
      return decoded;
    }

    settings = mergeMaps(settings, decoded.val);
    sources.push({ layer: file.val.layer, filePath: file.val.filePath });
  }

  return createOk({ settings, sources });
}

/**
 * 設定を読み込む
 *
 * - settingsPath 未指定: 階層化ロード（global → project）
 * - settingsPath 指定: 指定されたファイルのみを読み込む
 */
export async function loadSettings(
  registry: OptionRegistry,
  settingsPath?: string,
): Promise<Result<LoadedSettings, ConfigError>> {
  if (settingsPath === undefined) {
    return loadLayeredSettings(registry);
  }
  return loadSettingsFile(registry, settingsPath);
}
