/**
 * Config Tree Types
 *
 * 設定ツリーのタグ付きユニオン型定義。
 * map / scalar / list / artifact の4種類のノードで任意の深さの設定を表現する。
 */

/**
 * スカラー値として許容されるプリミティブ
 */
export type ScalarValue = string | number | boolean | null;

/**
 * マップノード（文字列キー → 子ノード）
 *
 * キーの挿入順序は出力の安定性のために保持される
 */
export interface MapNode {
  readonly kind: 'map';
  readonly entries: Readonly<Record<string, ConfigTree>>;
}

/**
 * スカラーノード
 */
export interface ScalarNode {
  readonly kind: 'scalar';
  readonly value: ScalarValue;
}

/**
 * リストノード
 *
 * 要素はスカラーまたはアーティファクト（例: environment.systemPackages）
 */
export interface ListNode {
  readonly kind: 'list';
  readonly items: readonly ConfigTree[];
}

/**
 * アーティファクトノード（ビルド成果物）
 *
 * 中身は不透明。`realize` を呼ぶとビルドが走る想定のため、
 * ドキュメント生成の経路では決して呼び出さない。
 */
export interface ArtifactNode {
  readonly kind: 'artifact';
  /** 自己申告の論理名（ツリー上の位置より優先される） */
  readonly name?: string;
  /** ビルド成果物のパスを返す遅延評価関数 */
  readonly realize: () => string;
}

export type ConfigTree = MapNode | ScalarNode | ListNode | ArtifactNode;

// ===== コンストラクタ =====

export const mapNode = (entries: Readonly<Record<string, ConfigTree>> = {}): MapNode => ({
  kind: 'map',
  entries,
});

export const scalarNode = (value: ScalarValue): ScalarNode => ({
  kind: 'scalar',
  value,
});

export const listNode = (items: readonly ConfigTree[] = []): ListNode => ({
  kind: 'list',
  items,
});

export const artifactNode = (realize: () => string, name?: string): ArtifactNode =>
  name === undefined ? { kind: 'artifact', realize } : { kind: 'artifact', name, realize };

/**
 * プレースホルダ文字列を生成
 *
 * 例: `pkgs.foo` → `${pkgs.foo}`
 */
export const placeholder = (logicalName: string): string => `\${${logicalName}}`;

/**
 * ドット区切りのキーパスを連結
 */
export function joinKeyPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

/**
 * マップの自身のエントリを取得（プロトタイプ上のプロパティは見ない）
 */
export function ownEntry(map: MapNode, key: string): ConfigTree | undefined {
  return Object.hasOwn(map.entries, key) ? map.entries[key] : undefined;
}

/**
 * キーと子ノードの組からマップノードを作る
 *
 * `__proto__` もそのままエントリとして定義される
 */
export const mapNodeFromEntries = (entries: Iterable<readonly [string, ConfigTree]>): MapNode =>
  mapNode(Object.fromEntries(entries));

/**
 * ドット区切りのキーパスでノードを取得
 *
 * リストはインデックス（数字のセグメント）で辿る。
 * 途中で見つからない場合はundefinedを返す。
 */
export function getNodeAt(tree: ConfigTree, keyPath: string): ConfigTree | undefined {
  let current: ConfigTree = tree;

  for (const part of keyPath.split('.')) {
    if (!part) continue;

    if (current.kind === 'map') {
      const next = ownEntry(current, part);
      if (next === undefined) {
        return undefined;
      }
      current = next;
    } else if (current.kind === 'list' && /^\d+$/.test(part)) {
      const next: ConfigTree | undefined = current.items[Number(part)];
      if (next === undefined) {
        return undefined;
      }
      current = next;
    } else {
      return undefined;
    }
  }

  return current;
}

/**
 * ブール値を取得（スカラーのboolean以外はfallback）
 */
export function getBoolean(tree: ConfigTree, keyPath: string, fallback = false): boolean {
  const node = getNodeAt(tree, keyPath);
  if (node?.kind === 'scalar' && typeof node.value === 'boolean') {
    return node.value;
  }
  return fallback;
}

/**
 * リストの要素を取得（リスト以外は空配列）
 */
export function getListItems(tree: ConfigTree, keyPath: string): readonly ConfigTree[] {
  const node = getNodeAt(tree, keyPath);
  return node?.kind === 'list' ? node.items : [];
}

/**
 * ドット区切りのキーパスに値を置いた最小のマップツリーを作る
 *
 * 例: `treeAt('a.b', x)` → `{ a: { b: x } }`
 */
export function treeAt(keyPath: string, value: ConfigTree): ConfigTree {
  const parts = keyPath.split('.').filter((part) => part.length > 0);
  let result = value;

  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i];
    if (part === undefined) continue;
    result = mapNode({ [part]: result });
  }

  return result;
}

/**
 * 凍結したコピーを作る
 *
 * 入力のノードは凍結しない（呼び出し側が持つ部分木を共有していてもよい）
 */
export function frozenCopy(tree: ConfigTree): ConfigTree {
  switch (tree.kind) {
    case 'map':
      return frozenMapCopy(tree);
    case 'list':
      return Object.freeze(listNode(Object.freeze(tree.items.map(frozenCopy))));
    case 'scalar':
      return Object.freeze(scalarNode(tree.value));
    case 'artifact':
      return Object.freeze(artifactNode(tree.realize, tree.name));
  }
}

/**
 * マップ版の frozenCopy
 */
export function frozenMapCopy(map: MapNode): MapNode {
  const entries = Object.entries(map.entries).map(([key, child]): [string, ConfigTree] => [key, frozenCopy(child)]);
  return Object.freeze(mapNode(Object.freeze(Object.fromEntries(entries))));
}
