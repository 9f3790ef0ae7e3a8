/**
 * Scrub command
 *
 * $artifact 記法を含むJSONを読み込み、アーティファクトをプレースホルダへ置き換えて表示する
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { scrub } from '../../core/scrub/scrubber.ts';
import { encodeTree } from '../../core/tree/json-codec.ts';
import { loadTreeFile } from '../utils/load-tree.ts';
import { exitWithError } from '../utils/report-error.ts';

interface ScrubOptions {
  root?: string;
}

async function scrubCommand(file: string, options: ScrubOptions): Promise<void> {
  const tree = await loadTreeFile(file);
  if (isErr(tree)) {
    exitWithError(tree.err);
  }

  const scrubbed = scrub(tree.val, { rootName: options.root ?? '' });
  if (isErr(scrubbed)) {
    exitWithError(scrubbed.err);
  }

  console.log(JSON.stringify(encodeTree(scrubbed.val), null, 2));
}

/**
 * scrub コマンドを作成
 */
export function createScrubCommand(): Command {
  return new Command('scrub')
    .description('Replace build artifacts in a JSON tree with ${path} placeholders')
    .argument('<file>', 'JSON file ($artifact markers)')
    .option('--root <name>', 'Logical name of the tree root (e.g., "pkgs")')
    .action(scrubCommand);
}
