#!/usr/bin/env node

/**
 * settings.json 用の JSON スキーマを生成
 *
 * オプションレジストリから組み立てたスキーマを z.toJSONSchema() で書き出す
 */

import * as z from 'zod';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isErr } from 'option-t/plain_result';
import { createOptionRegistry } from '../src/core/schema/registry.ts';
import { allDocumentationOptions } from '../src/core/documentation/options.ts';

async function main() {
  const registry = createOptionRegistry(allDocumentationOptions);
  if (isErr(registry)) {
    throw new Error(registry.err.message);
  }

  const jsonSchema = z.toJSONSchema(registry.val.settingsSchema());

  const schemaWithMetadata = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'docs-compose settings',
    description: 'Settings file for docs-compose (.docs-compose/settings.json)',
    ...jsonSchema,
  };

  const distPath = path.join(process.cwd(), 'dist');
  await fs.mkdir(distPath, { recursive: true });

  const schemaPath = path.join(distPath, 'settings.schema.json');
  await fs.writeFile(schemaPath, JSON.stringify(schemaWithMetadata, null, 2) + '\n', 'utf-8');

  console.log(`✅ JSON schema generated: ${schemaPath}`);
}

main().catch((error) => {
  console.error('❌ Failed to generate schema:', error);
  process.exit(1);
});
