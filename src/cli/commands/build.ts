/**
 * Build command
 *
 * ドキュメント生成パス全体を実行し、options.json を書き出す
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { assembleDocumentation } from '../../core/documentation/assembly.ts';
import { OptionsJsonRenderer } from '../../adapters/renderer/options-json-renderer.ts';
import { consoleLogger } from '../../adapters/logger/logger.ts';
import { loadSettings } from '../utils/layered-settings.ts';
import { loadRegistry } from '../utils/registry.ts';
import { exitWithError } from '../utils/report-error.ts';
import { loadPackages } from './compose.ts';

export const DEFAULT_RELEASE = '24.05';

interface BuildOptions {
  settings?: string;
  packages?: string;
  out: string;
  release: string;
}

async function buildCommand(options: BuildOptions): Promise<void> {
  const registry = loadRegistry();

  const loaded = await loadSettings(registry, options.settings);
  if (isErr(loaded)) {
    exitWithError(loaded.err);
  }

  const packages = await loadPackages(options.packages);

  const result = await assembleDocumentation(
    { registry, settings: loaded.val.settings, packages, release: options.release },
    { renderer: new OptionsJsonRenderer(options.out), logger: consoleLogger },
  );
  if (isErr(result)) {
    exitWithError(result.err);
  }

  const { manual, options: documented } = result.val;
  if (manual === null) {
    console.log('Documentation is disabled; nothing was rendered');
    return;
  }

  console.log(`✓ Documented ${documented.length} options`);
  for (const file of manual.files) {
    console.log(`  ${file}`);
  }
}

/**
 * build コマンドを作成
 */
export function createBuildCommand(): Command {
  return new Command('build')
    .description('Compose settings, scrub artifacts and render options.json')
    .option('--settings <path>', 'Read settings from this file instead of the layered settings')
    .option('--packages <path>', 'Package set JSON file ($artifact markers)')
    .option('--out <dir>', 'Output directory', 'result')
    .option('--release <version>', 'Release number shown in the manual', DEFAULT_RELEASE)
    .action(buildCommand);
}
