import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { isErr, isOk } from 'option-t/plain_result';
import {
  loadLayeredSettings,
  loadSettings,
  loadSettingsFile,
  resolveSettingsLayerPaths,
} from '../../../../src/cli/utils/layered-settings.ts';
import { encodeTree } from '../../../../src/core/tree/json-codec.ts';
import { documentationRegistry } from '../../../helpers/test-deps.ts';

describe('Layered Settings', () => {
  let tempDir: string;
  let projectDir: string;
  let originalXdgConfigHome: string | undefined;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docs-compose-settings-test-'));
    projectDir = path.join(tempDir, 'project');

    // グローバル設定を一時ディレクトリへ隔離
    originalXdgConfigHome = process.env['XDG_CONFIG_HOME'];
    process.env['XDG_CONFIG_HOME'] = path.join(tempDir, 'xdg');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });

    if (originalXdgConfigHome === undefined) {
      delete process.env['XDG_CONFIG_HOME'];
    } else {
      process.env['XDG_CONFIG_HOME'] = originalXdgConfigHome;
    }
  });

  const writeJson = async (filePath: string, value: unknown): Promise<void> => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(value), 'utf-8');
  };

  it('should resolve settings paths', () => {
    const paths = resolveSettingsLayerPaths(projectDir);

    assert.strictEqual(paths.global, path.join(tempDir, 'xdg', 'docs-compose', 'settings.json'));
    assert.strictEqual(paths.project, path.join(projectDir, '.docs-compose', 'settings.json'));
  });

  it('should return empty settings when no file exists', async () => {
    const result = await loadLayeredSettings(documentationRegistry(), projectDir);

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val.settings), {});
    assert.deepStrictEqual(result.val.sources, []);
  });

  it('should merge global and project settings', async () => {
    const paths = resolveSettingsLayerPaths(projectDir);
    await writeJson(paths.global, {
      documentation: {
        man: { enable: false },
        nixos: { extraModuleSources: ['/global/modules'] },
      },
    });
    await writeJson(paths.project, {
      documentation: {
        man: { enable: true },
        nixos: { extraModuleSources: [{ $artifact: 'pkgs.customModules' }] },
      },
    });

    const result = await loadLayeredSettings(documentationRegistry(), projectDir);

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val.settings), {
      documentation: {
        man: { enable: true },
        nixos: { extraModuleSources: ['/global/modules', { $artifact: 'pkgs.customModules' }] },
      },
    });
    assert.deepStrictEqual(result.val.sources, [
      { layer: 'global', filePath: paths.global },
      { layer: 'project', filePath: paths.project },
    ]);
  });

  it('should reject settings that fail validation', async () => {
    const paths = resolveSettingsLayerPaths(projectDir);
    await writeJson(paths.project, { documentation: { enable: 'yes' } });

    const result = await loadLayeredSettings(documentationRegistry(), projectDir);

    assert.ok(isErr(result), 'Should fail');
    assert.strictEqual(result.err.type, 'ConfigValidationError');
  });

  it('should reject malformed JSON', async () => {
    const paths = resolveSettingsLayerPaths(projectDir);
    await fs.mkdir(path.dirname(paths.global), { recursive: true });
    await fs.writeFile(paths.global, '{ not json', 'utf-8');

    const result = await loadLayeredSettings(documentationRegistry(), projectDir);

    assert.ok(isErr(result), 'Should fail');
    assert.strictEqual(result.err.type, 'ConfigParseError');
  });

  it('should reject settings that are not an object', async () => {
    const filePath = path.join(tempDir, 'list.json');
    await writeJson(filePath, []);

    const result = await loadSettingsFile(documentationRegistry(), filePath);

    assert.ok(isErr(result), 'Should fail');
    assert.strictEqual(result.err.type, 'ConfigValidationError');
  });

  it('should load only the given file with an explicit path', async () => {
    const paths = resolveSettingsLayerPaths(projectDir);
    await writeJson(paths.global, { documentation: { enable: false } });
    const filePath = path.join(tempDir, 'custom.json');
    await writeJson(filePath, { documentation: { doc: { enable: false } } });

    const result = await loadSettings(documentationRegistry(), filePath);

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val.settings), { documentation: { doc: { enable: false } } });
    assert.deepStrictEqual(result.val.sources, [{ layer: 'project', filePath }]);
  });

  it('should fail for a missing explicit file', async () => {
    const result = await loadSettingsFile(documentationRegistry(), path.join(tempDir, 'missing.json'));

    assert.ok(isErr(result), 'Should fail');
    assert.strictEqual(result.err.type, 'ConfigParseError');
  });
});
