/**
 * options.json Renderer
 *
 * ManualRenderer の最小実装。オプション一覧と合成済み設定をJSONとして書き出す。
 * HTML や man ページの生成は行わない。
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { artifactNode } from '../../types/config-tree.ts';
import type { RenderError } from '../../types/errors.ts';
import { renderError } from '../../types/errors.ts';
import type { ManualOutputs } from '../../core/documentation/fragments.ts';
import type {
  ManualInput,
  ManualRenderer,
  RenderedManual,
} from '../../core/documentation/renderer.ts';

export const OPTIONS_JSON_FILE = 'options.json';
export const CONFIG_JSON_FILE = 'config.json';

export class OptionsJsonRenderer implements ManualRenderer {
  private readonly outDir: string;

  constructor(outDir: string) {
    this.outDir = path.resolve(outDir);
  }

  /**
   * 出力ディレクトリ配下の各成果物
   *
   * options.json 以外はこのレンダラでは生成されないため、realize は失敗する
   */
  outputs(): ManualOutputs {
    const notProduced = (name: string) => () => {
      throw new Error(`${name} is not produced by the options.json renderer`);
    };

    return {
      manpages: artifactNode(notProduced('manpages'), 'system.build.manual.manpages'),
      manualHTML: artifactNode(notProduced('manualHTML'), 'system.build.manual.manualHTML'),
      manualHTMLIndex: artifactNode(notProduced('manualHTMLIndex'), 'system.build.manual.manualHTMLIndex'),
      optionsJSON: artifactNode(
        () => path.join(this.outDir, OPTIONS_JSON_FILE),
        'system.build.manual.optionsJSON',
      ),
      nixosHelp: artifactNode(notProduced('nixos-help'), 'nixos-help'),
    };
  }

  async render(input: ManualInput): Promise<Result<RenderedManual, RenderError>> {
    const options = Object.fromEntries(
      input.options.map((option) => [
        option.name,
        {
          type: option.type,
          description: option.description,
          default: option.default,
          ...(option.example === undefined ? {} : { example: option.example }),
          declarations: option.declarations,
        },
      ]),
    );

    const optionsPath = path.join(this.outDir, OPTIONS_JSON_FILE);
    const configPath = path.join(this.outDir, CONFIG_JSON_FILE);
    const document = {
      release: input.release,
      revision: input.revision,
      options,
    };

    try {
      await fs.mkdir(this.outDir, { recursive: true });
      await fs.writeFile(optionsPath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
      await fs.writeFile(configPath, JSON.stringify(input.config, null, 2) + '\n', 'utf-8');
      return createOk({ files: [optionsPath, configPath] });
    } catch (error) {
      return createErr(renderError(error));
    }
  }
}
