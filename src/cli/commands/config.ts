/**
 * Config command
 *
 * 設定管理コマンド（show, path, validate）
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { getNodeAt } from '../../types/config-tree.ts';
import { mergeMaps } from '../../core/compose/merge.ts';
import { encodeTree } from '../../core/tree/json-codec.ts';
import {
  loadLayeredSettings,
  loadSettingsFile,
  resolveSettingsLayerPaths,
} from '../utils/layered-settings.ts';
import { loadRegistry } from '../utils/registry.ts';
import { exitWithError } from '../utils/report-error.ts';
import { formatValue } from '../utils/format-value.ts';

/**
 * docs-compose config show [key]
 *
 * マージ済み設定を表示（--defaults でスキーマのデフォルトも重ねる）
 */
async function showCommand(
  key: string | undefined,
  options: { withSource?: boolean; defaults?: boolean; json?: boolean },
): Promise<void> {
  const registry = loadRegistry();
  const result = await loadLayeredSettings(registry);
  if (isErr(result)) {
    exitWithError(result.err);
  }

  const { sources } = result.val;
  const settings = options.defaults ? mergeMaps(registry.defaults(), result.val.settings) : result.val.settings;

  const node = key ? getNodeAt(settings, key) : settings;
  if (node === undefined) {
    console.error(`Key not found: ${key}`);
    process.exit(1);
  }

  const value = encodeTree(node);

  if (options.json) {
    console.log(JSON.stringify(value, null, 2));
  } else if (key) {
    console.log(`${key}: ${formatValue(value)}`);
  } else {
    console.log(`Merged settings:${formatValue(value)}`);
  }

  if (options.withSource && !options.json) {
    console.log('\n--- Settings Sources ---');
    if (sources.length === 0) {
      console.log('  (no settings files found)');
    }
    for (const source of sources) {
      console.log(`  [${source.layer}] ${source.filePath}`);
    }
  }
}

/**
 * docs-compose config path
 *
 * 設定ファイルの場所を表示
 */
function pathCommand(): void {
  const paths = resolveSettingsLayerPaths();
  console.log(`global:  ${paths.global}`);
  console.log(`project: ${paths.project}`);
}

/**
 * docs-compose config validate
 *
 * 設定を検証
 */
async function validateCommand(options: { file?: string }): Promise<void> {
  const registry = loadRegistry();

  if (options.file) {
    const result = await loadSettingsFile(registry, options.file);
    if (isErr(result)) {
      exitWithError(result.err);
    }
    console.log(`✓ Settings are valid: ${options.file}`);
    return;
  }

  const result = await loadLayeredSettings(registry);
  if (isErr(result)) {
    exitWithError(result.err);
  }
  console.log('✓ Merged settings are valid');
}

/**
 * config コマンドを作成
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description('Inspect settings files');

  config
    .command('show')
    .description('Show merged settings')
    .argument('[key]', 'Settings key (e.g., "documentation.man.enable")')
    .option('--with-source', 'Show which settings files were read')
    .option('--defaults', 'Include option defaults')
    .option('--json', 'Output as JSON')
    .action(showCommand);

  config.command('path').description('Show settings file locations').action(pathCommand);

  config
    .command('validate')
    .description('Validate settings')
    .option('--file <path>', 'Validate specific file')
    .action(validateCommand);

  return config;
}
