/**
 * Compose command
 *
 * 設定を合成し、インストール指示を表示する
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { mapNode, type ConfigTree } from '../../types/config-tree.ts';
import { resolveDocumentation } from '../../core/documentation/assembly.ts';
import type { InstallDirectives } from '../../core/documentation/install-directives.ts';
import { OptionsJsonRenderer } from '../../adapters/renderer/options-json-renderer.ts';
import { consoleLogger, silentLogger } from '../../adapters/logger/logger.ts';
import { loadSettings } from '../utils/layered-settings.ts';
import { loadTreeFile } from '../utils/load-tree.ts';
import { loadRegistry } from '../utils/registry.ts';
import { exitWithError } from '../utils/report-error.ts';
import { formatValue } from '../utils/format-value.ts';

interface ComposeOptions {
  settings?: string;
  packages?: string;
  json?: boolean;
}

/**
 * パッケージセットを読み込む（未指定なら空）
 */
export async function loadPackages(packagesPath: string | undefined): Promise<ConfigTree> {
  if (packagesPath === undefined) {
    return mapNode();
  }
  const packages = await loadTreeFile(packagesPath);
  if (isErr(packages)) {
    exitWithError(packages.err);
  }
  return packages.val;
}

function printDirectives(directives: InstallDirectives): void {
  console.log(`Install directives:${formatValue(directives)}`);
}

async function composeCommand(options: ComposeOptions): Promise<void> {
  const registry = loadRegistry();

  const loaded = await loadSettings(registry, options.settings);
  if (isErr(loaded)) {
    exitWithError(loaded.err);
  }

  const packages = await loadPackages(options.packages);

  // --json 時は標準出力をJSONだけにする
  const logger = options.json ? silentLogger : consoleLogger;

  const resolution = resolveDocumentation(
    { registry, settings: loaded.val.settings, packages },
    new OptionsJsonRenderer('result').outputs(),
    logger,
  );
  if (isErr(resolution)) {
    exitWithError(resolution.err);
  }

  const { directives, composition } = resolution.val;

  if (options.json) {
    console.log(
      JSON.stringify({ active: composition.active, inactive: composition.inactive, directives }, null, 2),
    );
    return;
  }

  printDirectives(directives);
}

/**
 * compose コマンドを作成
 */
export function createComposeCommand(): Command {
  return new Command('compose')
    .description('Compose documentation settings and print install directives')
    .option('--settings <path>', 'Read settings from this file instead of the layered settings')
    .option('--packages <path>', 'Package set JSON file ($artifact markers)')
    .option('--json', 'Output as JSON')
    .action(composeCommand);
}
