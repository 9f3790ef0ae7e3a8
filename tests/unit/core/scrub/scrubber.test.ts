import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isErr, isOk } from 'option-t/plain_result';
import {
  artifactNode,
  listNode,
  mapNode,
  scalarNode,
  type ConfigTree,
} from '../../../../src/types/config-tree.ts';
import { scrub } from '../../../../src/core/scrub/scrubber.ts';
import { encodeTree } from '../../../../src/core/tree/json-codec.ts';
import { trackedArtifact } from '../../../helpers/test-deps.ts';

describe('Artifact Scrubber', () => {
  it('should replace a named artifact and keep sibling scalars', () => {
    const foo = trackedArtifact('pkgs.foo');
    const tree = mapNode({
      pkgs: mapNode({ foo: foo.node, bar: scalarNode('text') }),
    });

    const result = scrub(tree);

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val), {
      pkgs: { foo: '${pkgs.foo}', bar: 'text' },
    });
    assert.strictEqual(foo.realizeCalls(), 0);
  });

  it('should name an anonymous artifact after its position under the root name', () => {
    const tree = mapNode({
      hello: trackedArtifact().node,
      nested: mapNode({ tool: trackedArtifact().node }),
    });

    const result = scrub(tree, { rootName: 'pkgs' });

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val), {
      hello: '${pkgs.hello}',
      nested: { tool: '${pkgs.nested.tool}' },
    });
  });

  it('should prefer the intrinsic name over the position', () => {
    const tree = mapNode({
      systemPackages: listNode([trackedArtifact('pkgs.texinfoInteractive').node]),
    });

    const result = scrub(tree, { rootName: 'environment' });

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val), {
      systemPackages: ['${pkgs.texinfoInteractive}'],
    });
  });

  it('should use list indices as path segments', () => {
    const tree = mapNode({
      extraModuleSources: listNode([scalarNode('/etc/modules'), trackedArtifact().node]),
    });

    const result = scrub(tree);

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val), {
      extraModuleSources: ['/etc/modules', '${extraModuleSources.1}'],
    });
  });

  it('should scrub an artifact at the root', () => {
    const named = scrub(trackedArtifact('hello').node);
    assert.ok(isOk(named), 'Should succeed');
    assert.deepStrictEqual(named.val, scalarNode('${hello}'));

    const positional = scrub(trackedArtifact().node, { rootName: 'pkgs.hello' });
    assert.ok(isOk(positional), 'Should succeed');
    assert.deepStrictEqual(positional.val, scalarNode('${pkgs.hello}'));
  });

  it('should fail for an anonymous artifact at an unnamed root', () => {
    const result = scrub(trackedArtifact().node);

    assert.ok(isErr(result), 'Should fail');
    assert.strictEqual(result.err.type, 'StructuralError');
    assert.strictEqual(result.err.reason, 'unnamed-artifact');
    assert.strictEqual(result.err.path, '');
    assert.strictEqual(result.err.message, 'Artifact at <root> cannot report an identity');
  });

  it('should fail when the namer reports no name', () => {
    const tree = mapNode({ a: mapNode({ b: trackedArtifact('b').node }) });

    const result = scrub(tree, { nameOf: () => '' });

    assert.ok(isErr(result), 'Should fail');
    assert.strictEqual(result.err.reason, 'unnamed-artifact');
    assert.strictEqual(result.err.path, 'a.b');
  });

  it('should honor a custom artifact predicate', () => {
    const tree = mapNode({
      hello: scalarNode('/store/abc-hello'),
      greeting: scalarNode('hi'),
    });

    const result = scrub(tree, {
      rootName: 'pkgs',
      isArtifact: (node) =>
        node.kind === 'scalar' && typeof node.value === 'string' && node.value.startsWith('/store/'),
    });

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val), {
      hello: '${pkgs.hello}',
      greeting: 'hi',
    });
  });

  it('should keep an artifact under a __proto__ key', () => {
    const tree = mapNode(Object.fromEntries([['__proto__', trackedArtifact('pkgs.x').node]]));

    const result = scrub(tree);

    assert.ok(isOk(result), 'Should succeed');
    assert.ok(result.val.kind === 'map');
    assert.deepStrictEqual(Object.keys(result.val.entries), ['__proto__']);
    assert.strictEqual(JSON.stringify(encodeTree(result.val)), '{"__proto__":"${pkgs.x}"}');
  });

  it('should return an empty map for an empty map', () => {
    const result = scrub(mapNode());

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(result.val, mapNode());
  });

  it('should leave an already scrubbed tree unchanged', () => {
    const tree = mapNode({
      pkgs: mapNode({ foo: trackedArtifact('pkgs.foo').node }),
    });

    const once = scrub(tree);
    assert.ok(isOk(once), 'Should succeed');
    const twice = scrub(once.val);
    assert.ok(isOk(twice), 'Should succeed');

    assert.deepStrictEqual(encodeTree(twice.val), encodeTree(once.val));
  });

  it('should not modify the input tree', () => {
    const foo = trackedArtifact('pkgs.foo');
    const tree = mapNode({ pkgs: mapNode({ foo: foo.node }) });

    const result = scrub(tree);

    assert.ok(isOk(result), 'Should succeed');
    const pkgs = tree.entries['pkgs'];
    assert.ok(pkgs?.kind === 'map');
    assert.strictEqual(pkgs.entries['foo'], foo.node);
  });

  it('should detect a cyclic reference', () => {
    const entries: Record<string, ConfigTree> = { value: scalarNode(1) };
    const loop = mapNode(entries);
    entries['self'] = loop;

    const result = scrub(mapNode({ root: loop }));

    assert.ok(isErr(result), 'Should fail');
    assert.strictEqual(result.err.reason, 'cycle');
    assert.strictEqual(result.err.path, 'root.self');
    assert.strictEqual(
      result.err.message,
      'Cyclic reference detected in configuration tree at root.self',
    );
  });

  it('should accept a subtree shared by two parents', () => {
    const shared = mapNode({ tool: artifactNode(() => '/store/tool') });

    const result = scrub(mapNode({ a: shared, b: shared }), { rootName: 'pkgs' });

    assert.ok(isOk(result), 'Should succeed');
    assert.deepStrictEqual(encodeTree(result.val), {
      a: { tool: '${pkgs.a.tool}' },
      b: { tool: '${pkgs.b.tool}' },
    });
  });
});
