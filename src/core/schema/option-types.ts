/**
 * Option Types
 *
 * オプション宣言で使う型。表示名とZodスキーマの組。
 */

import { z } from 'zod';
import type { OptionType } from '../../types/option.ts';
import { ArtifactMarkerSchema } from '../tree/json-codec.ts';

const listOf = (element: OptionType): OptionType => ({
  name: `list of ${element.name}`,
  schema: z.array(element.schema),
});

const either = (left: OptionType, right: OptionType): OptionType => ({
  name: `${left.name} or ${right.name}`,
  schema: z.union([left.schema, right.schema]),
});

export const optionTypes = {
  bool: { name: 'boolean', schema: z.boolean() },
  str: { name: 'string', schema: z.string() },
  lines: { name: 'strings concatenated with "\\n"', schema: z.string() },
  /** ファイルパス（ビルド成果物も可） */
  path: { name: 'path', schema: z.union([z.string(), ArtifactMarkerSchema]) },
  /** ビルド成果物 */
  package: { name: 'package', schema: ArtifactMarkerSchema },
  listOf,
  either,
} as const satisfies Record<string, OptionType | ((...types: OptionType[]) => OptionType)>;
