import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createErr, type Result } from 'option-t/plain_result';
import type { ConfigTree } from '../../types/config-tree.ts';
import type { ConfigError } from '../../types/errors.ts';
import { configParseError } from '../../types/errors.ts';
import { decodeTree } from '../../core/tree/json-codec.ts';

/**
 * $artifact 記法を含むJSONファイルを設定ツリーとして読み込む
 *
 * @param filePath - JSONファイルのパス
 */
export async function loadTreeFile(filePath: string): Promise<Result<ConfigTree, ConfigError>> {
  const absolutePath = path.resolve(filePath);

  let data: unknown;
  try {
    const content = await fs.readFile(absolutePath, 'utf-8');
    data = JSON.parse(content);
  } catch (error) {
    return createErr(configParseError(absolutePath, error));
  }

  return decodeTree(data);
}
