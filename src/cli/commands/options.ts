/**
 * Options command
 *
 * 宣言済みのオプションを一覧表示する
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { toDocumentedOptions } from '../../core/documentation/documented-options.ts';
import { loadRegistry } from '../utils/registry.ts';
import { exitWithError } from '../utils/report-error.ts';
import { formatValue } from '../utils/format-value.ts';

interface OptionsCommandOptions {
  json?: boolean;
}

function optionsCommand(options: OptionsCommandOptions): void {
  const registry = loadRegistry();

  const documented = toDocumentedOptions(registry.list(), []);
  if (isErr(documented)) {
    exitWithError(documented.err);
  }

  if (options.json) {
    console.log(JSON.stringify(documented.val, null, 2));
    return;
  }

  for (const option of documented.val) {
    console.log(`${option.name} (${option.type})`);
    console.log(`  default: ${formatValue(option.default, 1)}`);
    for (const line of option.description.split('\n')) {
      console.log(`  ${line}`);
    }
    console.log('');
  }
}

/**
 * options コマンドを作成
 */
export function createOptionsCommand(): Command {
  return new Command('options')
    .description('List declared options')
    .option('--json', 'Output as JSON')
    .action(optionsCommand);
}
