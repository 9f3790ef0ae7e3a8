/**
 * Install Directives
 *
 * 合成済み設定から、インストール処理に渡す指示を読み出す
 */

import {
  getBoolean,
  getListItems,
  getNodeAt,
  joinKeyPath,
  type ConfigTree,
} from '../../types/config-tree.ts';
import type { ResolvedConfig } from '../../types/fragment.ts';
import { intrinsicOrPositionalName } from '../scrub/scrubber.ts';
import { DocumentationPaths } from './options.ts';

export interface InstallDirectives {
  readonly installManPages: boolean;
  readonly installInfoPages: boolean;
  readonly installDocs: boolean;
  readonly installDevDocs: boolean;
  readonly installNixosManual: boolean;
  readonly generateManCaches: boolean;
  /** システムパスへリンクするディレクトリ */
  readonly pathsToLink: readonly string[];
  /** 追加でインストールするパッケージ出力名 */
  readonly extraOutputsToInstall: readonly string[];
  /** 追加でインストールするパッケージの論理名 */
  readonly systemPackages: readonly string[];
  readonly gettyHelpLine: string | null;
}

/**
 * リストの要素を文字列として読む
 *
 * アーティファクトは realize せず論理名で表す。文字列以外のスカラーは除外。
 */
function readNames(resolved: ConfigTree, keyPath: string): string[] {
  const names: string[] = [];
  for (const [index, item] of getListItems(resolved, keyPath).entries()) {
    if (item.kind === 'artifact') {
      names.push(intrinsicOrPositionalName(item, joinKeyPath(keyPath, String(index))));
    } else if (item.kind === 'scalar' && typeof item.value === 'string') {
      names.push(item.value);
    }
  }
  return names;
}

/**
 * インストール指示を導出する
 *
 * documentation.enable が false の場合、個別の有効フラグに関わらずすべて false になる
 */
export function deriveInstallDirectives(resolved: ResolvedConfig): InstallDirectives {
  const enabled = getBoolean(resolved, DocumentationPaths.enable);
  const flag = (path: string): boolean => enabled && getBoolean(resolved, path);

  const helpLine = getNodeAt(resolved, 'services.getty.helpLine');

  return {
    installManPages: flag(DocumentationPaths.manEnable),
    installInfoPages: flag(DocumentationPaths.infoEnable),
    installDocs: flag(DocumentationPaths.docEnable),
    installDevDocs: flag(DocumentationPaths.devEnable),
    installNixosManual: flag(DocumentationPaths.nixosEnable),
    generateManCaches: flag(DocumentationPaths.manEnable) && getBoolean(resolved, DocumentationPaths.manGenerateCaches),
    pathsToLink: readNames(resolved, 'environment.pathsToLink'),
    extraOutputsToInstall: readNames(resolved, 'environment.extraOutputsToInstall'),
    systemPackages: readNames(resolved, 'environment.systemPackages'),
    gettyHelpLine: helpLine?.kind === 'scalar' && typeof helpLine.value === 'string' ? helpLine.value : null,
  };
}
