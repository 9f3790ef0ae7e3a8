/**
 * Documentation Options
 *
 * documentation.* オプションの宣言と改名定義
 */

import { artifactNode, listNode, scalarNode } from '../../types/config-tree.ts';
import { optionPath } from '../../types/branded.ts';
import type { OptionRename, OptionSpec } from '../../types/option.ts';
import { defineOption } from '../schema/registry.ts';
import { optionTypes } from '../schema/option-types.ts';

const DOCUMENTATION_MODULE = 'modules/misc/documentation.nix';

/** 宣言済みオプションのパス */
export const DocumentationPaths = {
  enable: 'documentation.enable',
  manEnable: 'documentation.man.enable',
  manGenerateCaches: 'documentation.man.generateCaches',
  manDbEnable: 'documentation.man.man-db.enable',
  mandocEnable: 'documentation.man.mandoc.enable',
  infoEnable: 'documentation.info.enable',
  docEnable: 'documentation.doc.enable',
  devEnable: 'documentation.dev.enable',
  nixosEnable: 'documentation.nixos.enable',
  nixosIncludeAllModules: 'documentation.nixos.includeAllModules',
  nixosExtraModuleSources: 'documentation.nixos.extraModuleSources',
} as const;

const enableOption = (path: string, defaultValue: boolean, description: string): OptionSpec =>
  defineOption({
    path,
    type: optionTypes.bool,
    default: scalarNode(defaultValue),
    description,
    declarations: [DOCUMENTATION_MODULE],
  });

export const documentationOptions: readonly OptionSpec[] = [
  enableOption(
    DocumentationPaths.enable,
    true,
    'Whether to install documentation of packages from environment.systemPackages into the generated system path.\n\n' +
      'See "Multiple-output packages" chapter in the nixpkgs manual for more info.',
  ),
  enableOption(
    DocumentationPaths.manEnable,
    true,
    'Whether to install manual pages. This also includes man outputs.',
  ),
  enableOption(
    DocumentationPaths.manGenerateCaches,
    false,
    'Whether to generate the manual page index caches. This allows searching for a page or keyword ' +
      'using utilities like apropos(1) and the -k option of man(1).',
  ),
  enableOption(
    DocumentationPaths.infoEnable,
    true,
    'Whether to install info pages and the info command. This also includes "info" outputs.',
  ),
  enableOption(
    DocumentationPaths.docEnable,
    true,
    "Whether to install documentation distributed in packages' /share/doc. Usually plain text and/or HTML. " +
      'This also includes "doc" outputs.',
  ),
  enableOption(
    DocumentationPaths.devEnable,
    false,
    'Whether to install documentation targeted at developers.\n' +
      '- This includes man pages targeted at developers if documentation.man.enable is set (this also includes "devman" outputs).\n' +
      '- This includes info pages targeted at developers if documentation.info.enable is set (this also includes "devinfo" outputs).\n' +
      '- This includes other pages targeted at developers if documentation.doc.enable is set (this also includes "devdoc" outputs).',
  ),
  enableOption(
    DocumentationPaths.nixosEnable,
    true,
    "Whether to install NixOS's own documentation.\n" +
      '- This includes man pages like configuration.nix(5) if documentation.man.enable is set.\n' +
      '- This includes the HTML manual and the nixos-help command if documentation.doc.enable is set.',
  ),
  enableOption(
    DocumentationPaths.nixosIncludeAllModules,
    false,
    "Whether the generated NixOS's documentation should include documentation for all the options from all " +
      'the NixOS modules included in the current configuration.nix. Disabling this will make the manual ' +
      'generator to ignore options defined outside of baseModules.',
  ),
  defineOption({
    path: DocumentationPaths.nixosExtraModuleSources,
    type: optionTypes.listOf(optionTypes.either(optionTypes.path, optionTypes.str)),
    default: listNode(),
    description:
      "Which extra NixOS module paths the generated NixOS's documentation should strip from options.",
    example: listNode([
      artifactNode(() => {
        throw new Error('pkgs.customModules is an example value');
      }, 'pkgs.customModules'),
    ]),
    declarations: [DOCUMENTATION_MODULE],
  }),
];

/**
 * man ページビューアの選択
 *
 * 実装は別モジュールだが、アサーションが参照するため宣言しておく
 */
export const manBackendOptions: readonly OptionSpec[] = [
  defineOption({
    path: DocumentationPaths.manDbEnable,
    type: optionTypes.bool,
    default: scalarNode(true),
    description: 'Whether to enable man-db as the default man page viewer.',
    declarations: ['modules/misc/man-db.nix'],
  }),
  defineOption({
    path: DocumentationPaths.mandocEnable,
    type: optionTypes.bool,
    default: scalarNode(false),
    description: 'Whether to enable mandoc as the default man page viewer.',
    declarations: ['modules/misc/mandoc.nix'],
  }),
];

/**
 * 旧名からの改名
 */
export const documentationRenames: readonly OptionRename[] = [
  { from: optionPath('programs.info.enable'), to: optionPath(DocumentationPaths.infoEnable) },
  { from: optionPath('programs.man.enable'), to: optionPath(DocumentationPaths.manEnable) },
  { from: optionPath('services.nixosManual.enable'), to: optionPath(DocumentationPaths.nixosEnable) },
];

/**
 * documentation モジュールが登録する全オプション
 */
export const allDocumentationOptions: readonly OptionSpec[] = [...documentationOptions, ...manBackendOptions];
