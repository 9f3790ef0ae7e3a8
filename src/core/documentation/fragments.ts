/**
 * Documentation Fragments
 *
 * documentation.* の設定値に応じて有効になる設定フラグメント群。
 * すべて documentation.enable が true のときだけ有効になる。
 */

import {
  artifactNode,
  getBoolean,
  getNodeAt,
  joinKeyPath,
  listNode,
  mapNode,
  placeholder,
  scalarNode,
  type ArtifactNode,
  type ConfigTree,
} from '../../types/config-tree.ts';
import type { Fragment } from '../../types/fragment.ts';
import { fragment, guardFragment } from '../compose/composer.ts';
import { DocumentationPaths } from './options.ts';

/**
 * マニュアルレンダラが生成する成果物
 */
export interface ManualOutputs {
  readonly manpages: ArtifactNode;
  readonly manualHTML: ArtifactNode;
  readonly manualHTMLIndex: ArtifactNode;
  readonly optionsJSON: ArtifactNode;
  /** ブラウザでHTMLマニュアルを開くコマンド */
  readonly nixosHelp: ArtifactNode;
}

export const PACKAGE_SET_ROOT = 'pkgs';

export const GETTY_HELP_LINE = "\nRun 'nixos-help' for the NixOS manual.";

/**
 * パッケージセットからアーティファクトを参照する
 *
 * 位置から決まる名前（pkgs.<attrPath>）を自己申告名として付けるため、
 * systemPackages などへ移しても元の名前でプレースホルダ化される。
 * パッケージセットにない場合は realize で失敗する参照を返す。
 */
export function packageRef(packages: ConfigTree, attrPath: string): ArtifactNode {
  const logicalName = joinKeyPath(PACKAGE_SET_ROOT, attrPath);
  const node = getNodeAt(packages, attrPath);

  if (node?.kind === 'artifact') {
    return node.name ? node : artifactNode(node.realize, logicalName);
  }

  return artifactNode(() => {
    throw new Error(`Package ${logicalName} is not available`);
  }, logicalName);
}

const strings = (...values: string[]): ConfigTree => listNode(values.map(scalarNode));

/**
 * 開発者向けの出力名を条件付きで追加する
 */
const outputs = (base: ConfigTree, output: string): ConfigTree =>
  getBoolean(base, DocumentationPaths.devEnable) ? strings(output, `dev${output}`) : strings(output);

const isEnabled =
  (path: string) =>
  (base: ConfigTree): boolean =>
    getBoolean(base, path);

/**
 * documentation.* 用のフラグメントを作成
 *
 * @param base - デフォルトにユーザー設定を重ねたツリー（dev.enable 等の参照用）
 * @param packages - パッケージセット
 * @param manual - マニュアルの成果物
 * @returns 宣言順のフラグメント
 */
export function createDocumentationFragments(
  base: ConfigTree,
  packages: ConfigTree,
  manual: ManualOutputs,
): readonly Fragment[] {
  const texinfo = packageRef(packages, 'buildPackages.texinfo');
  const installInfo = `${placeholder(texinfo.name ?? 'pkgs.buildPackages.texinfo')}/bin/install-info`;

  const manEnabled = getBoolean(base, DocumentationPaths.manEnable);
  const docEnabled = getBoolean(base, DocumentationPaths.docEnable);

  const fragments: Fragment[] = [
    fragment('assertions', mapNode(), {
      assertions: [
        {
          check: (resolved) =>
            !(
              getBoolean(resolved, DocumentationPaths.manDbEnable) &&
              getBoolean(resolved, DocumentationPaths.mandocEnable)
            ),
          message: "man-db and mandoc can't be used as the default man page viewer at the same time!",
        },
      ],
    }),

    // 実際の man ページの扱いは man-db / mandoc 側の設定で決まる
    fragment(
      'man',
      mapNode({
        environment: mapNode({
          pathsToLink: strings('/share/man'),
          extraOutputsToInstall: outputs(base, 'man'),
        }),
      }),
      { when: isEnabled(DocumentationPaths.manEnable) },
    ),

    fragment(
      'info',
      mapNode({
        environment: mapNode({
          systemPackages: listNode([packageRef(packages, 'texinfoInteractive')]),
          pathsToLink: strings('/share/info'),
          extraOutputsToInstall: outputs(base, 'info'),
          extraSetup: scalarNode(
            [
              'if [ -w $out/share/info ]; then',
              '  shopt -s nullglob',
              '  for i in $out/share/info/*.info $out/share/info/*.info.gz; do',
              `      ${installInfo} $i $out/share/info/dir`,
              '  done',
              'fi',
              '',
            ].join('\n'),
          ),
        }),
      }),
      { when: isEnabled(DocumentationPaths.infoEnable) },
    ),

    fragment(
      'doc',
      mapNode({
        environment: mapNode({
          pathsToLink: strings('/share/doc'),
          extraOutputsToInstall: outputs(base, 'doc'),
        }),
      }),
      { when: isEnabled(DocumentationPaths.docEnable) },
    ),

    fragment(
      'nixos',
      mapNode({
        system: mapNode({
          build: mapNode({
            manual: mapNode({
              manpages: manual.manpages,
              manualHTML: manual.manualHTML,
              manualHTMLIndex: manual.manualHTMLIndex,
              optionsJSON: manual.optionsJSON,
            }),
          }),
        }),
        environment: mapNode({
          systemPackages: listNode([
            ...(manEnabled ? [manual.manpages] : []),
            ...(docEnabled ? [manual.manualHTML, manual.nixosHelp] : []),
          ]),
        }),
        ...(docEnabled
          ? { services: mapNode({ getty: mapNode({ helpLine: scalarNode(GETTY_HELP_LINE) }) }) }
          : {}),
      }),
      { when: isEnabled(DocumentationPaths.nixosEnable) },
    ),
  ];

  return fragments.map((item) => guardFragment(isEnabled(DocumentationPaths.enable), item));
}
