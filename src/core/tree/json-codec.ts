/**
 * JSON ⇔ ConfigTree 変換
 *
 * JSONの値を設定ツリーへ変換する。アーティファクトは特殊記法で表す。
 *
 * 使用例:
 * ```json
 * {
 *   "pkgs": {
 *     "hello": { "$artifact": true, "outPath": "/store/hello-2.12" },
 *     "manual": { "$artifact": "nixos-manual" }
 *   }
 * }
 * ```
 */

import { z } from 'zod';
import { createErr, createOk, isErr, type Result } from 'option-t/plain_result';
import {
  artifactNode,
  joinKeyPath,
  listNode,
  mapNodeFromEntries,
  scalarNode,
  type ConfigTree,
} from '../../types/config-tree.ts';
import type { TreeDecodeError } from '../../types/errors.ts';
import { treeDecodeError } from '../../types/errors.ts';

/**
 * 特殊記法: $artifact
 *
 * 文字列の場合は自己申告の論理名、true の場合はツリー上の位置を名前にする
 */
export const ArtifactMarkerSchema = z.strictObject({
  $artifact: z.union([z.string().min(1), z.literal(true)]),
  outPath: z.string().optional(),
});

export type ArtifactMarker = z.infer<typeof ArtifactMarkerSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * マーカーからアーティファクトノードを作る
 *
 * outPath がない場合、realize はビルドされていないことを示すエラーを投げる
 */
function markerToArtifact(marker: ArtifactMarker, path: string): ConfigTree {
  const name = marker.$artifact === true ? undefined : marker.$artifact;
  const outPath = marker.outPath;
  const realize = (): string => {
    if (outPath === undefined) {
      throw new Error(`Artifact ${name ?? path} has not been built`);
    }
    return outPath;
  };
  return artifactNode(realize, name);
}

/**
 * JSONの値を設定ツリーへ変換
 *
 * @param value - JSON.parse の結果
 * @param path - エラー表示用の位置
 */
export function decodeTree(value: unknown, path = ''): Result<ConfigTree, TreeDecodeError> {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  ) {
    return createOk(scalarNode(value));
  }

  if (Array.isArray(value)) {
    const items: ConfigTree[] = [];
    for (const [index, item] of value.entries()) {
      const decoded = decodeTree(item, joinKeyPath(path, String(index)));
      if (isErr(decoded)) {
        return decoded;
      }
      items.push(decoded.val);
    }
    return createOk(listNode(items));
  }

  if (isRecord(value)) {
    if (Object.hasOwn(value, '$artifact')) {
      const marker = ArtifactMarkerSchema.safeParse(value);
      if (!marker.success) {
        return createErr(treeDecodeError(path, `invalid $artifact marker: ${marker.error.message}`));
      }
      return createOk(markerToArtifact(marker.data, path));
    }

    const entries: [string, ConfigTree][] = [];
    for (const [key, child] of Object.entries(value)) {
      const decoded = decodeTree(child, joinKeyPath(path, key));
      if (isErr(decoded)) {
        return decoded;
      }
      entries.push([key, decoded.val]);
    }
    return createOk(mapNodeFromEntries(entries));
  }

  return createErr(treeDecodeError(path, `unsupported value of type ${typeof value}`));
}

/**
 * 設定ツリーをJSONの値へ変換
 *
 * アーティファクトは realize を呼ばずに $artifact 記法で書き出す
 */
export function encodeTree(tree: ConfigTree): unknown {
  switch (tree.kind) {
    case 'map':
      return Object.fromEntries(Object.entries(tree.entries).map(([key, child]) => [key, encodeTree(child)]));
    case 'list':
      return tree.items.map(encodeTree);
    case 'scalar':
      return tree.value;
    case 'artifact':
      return { $artifact: tree.name ?? true };
  }
}
