import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

const PackageJsonSchema = z.looseObject({ version: z.string() });

/**
 * package.json からバージョンを取得する
 *
 * 読み取りに失敗した場合は 0.0.0-dev
 */
export function getVersion(): string {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const projectRoot = join(dirname(currentFile), '..', '..', '..');
    const raw: unknown = JSON.parse(readFileSync(join(projectRoot, 'package.json'), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0-dev';
  } catch {
    return '0.0.0-dev';
  }
}
