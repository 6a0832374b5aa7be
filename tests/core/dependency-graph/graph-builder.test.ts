import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { buildProjectGraph } from '../../../src/core/dependency-graph/builder.js';
import { findUnused, findSingleConsumers, walkDependencyTree } from '../../../src/core/dependency-graph/queries.js';
import type { ProjectGraph } from '../../../src/core/dependency-graph/types.js';
import { UnresolvedDependencyError } from '../../../src/utils/errors.js';
import { createWorkspace, removeWorkspace, manifest, type WorkspaceLayout } from '../../test-helpers.js';

function countOccurrences(list: readonly string[], value: string): number {
  return list.filter((item) => item === value).length;
}

function assertEdgesArePaired(graph: ProjectGraph): void {
  for (const project of graph.projects) {
    for (const dependency of new Set(project.dependencies)) {
      const target = graph.get(dependency);
      assert.ok(target, `missing node ${dependency}`);
      assert.equal(
        countOccurrences(target.dependents, project.dir),
        countOccurrences(project.dependencies, dependency)
      );
    }
    for (const dependent of new Set(project.dependents)) {
      const source = graph.get(dependent);
      assert.ok(source, `missing node ${dependent}`);
      assert.equal(
        countOccurrences(source.dependencies, project.dir),
        countOccurrences(project.dependents, dependent)
      );
    }
  }
}

describe('buildProjectGraph', () => {
  let root: string | undefined;

  async function build(layout: WorkspaceLayout, exclude: string[] = []): Promise<ProjectGraph> {
    root = await createWorkspace(layout);
    return buildProjectGraph({ rootDir: root, manifestName: 'Cargo.toml', exclude });
  }

  afterEach(async () => {
    if (root) {
      await removeWorkspace(root);
      root = undefined;
    }
  });

  it('builds a chain a -> b -> c', async () => {
    const graph = await build({
      'a/Cargo.toml': manifest('a', ['../b']),
      'b/Cargo.toml': manifest('b', ['../c']),
      'c/Cargo.toml': manifest('c')
    });

    assert.deepEqual(graph.projects.map((project) => project.dir), ['a', 'b', 'c']);
    assert.deepEqual(findUnused(graph).map((project) => project.dir), ['a']);
    assert.deepEqual(
      findSingleConsumers(graph).map(({ project, dependent }) => [project.dir, dependent]),
      [['b', 'a'], ['c', 'b']]
    );
    assert.deepEqual(
      walkDependencyTree(graph, 'a').map(({ project, depth }) => [project.dir, depth]),
      [['a', 0], ['b', 1], ['c', 2]]
    );
    assert.equal(graph.edgeCount, 2);
    assertEdgesArePaired(graph);
  });

  it('fails when a dependency directory has no manifest', async () => {
    await assert.rejects(
      build({
        'd/Cargo.toml': manifest('d', ['../empty']),
        'empty/src/lib.rs': ''
      }),
      (error: unknown) => error instanceof UnresolvedDependencyError &&
        error.message === 'cannot find dependency empty'
    );
  });

  it('registers the root manifest as "."', async () => {
    const graph = await build({
      'Cargo.toml': manifest('workspace', ['crates/term', 'crates/mux']),
      'crates/mux/Cargo.toml': manifest('mux', ['../term']),
      'crates/term/Cargo.toml': manifest('term')
    });

    assert.deepEqual(graph.projects.map((project) => project.dir), ['.', 'crates/mux', 'crates/term']);
    assert.deepEqual(graph.get('.')?.dependencies, ['crates/term', 'crates/mux']);
    assert.deepEqual(graph.get('crates/term')?.dependents, ['.', 'crates/mux']);
    assertEdgesArePaired(graph);
  });

  it('silently skips declarations it cannot read or resolve', async () => {
    const graph = await build({
      'app/Cargo.toml': [
        '[dependencies]',
        'gone = { path = "../gone" }',
        'Upper = { path = "../Upper" }',
        '# lib = { path = "../lib" }'
      ].join('\n'),
      'Upper/Cargo.toml': manifest('upper'),
      'lib/Cargo.toml': manifest('lib')
    });

    assert.equal(graph.edgeCount, 0);
    assert.deepEqual(findUnused(graph).map((project) => project.dir), ['Upper', 'app', 'lib']);
  });

  it('keeps duplicate declarations as two edges', async () => {
    const graph = await build({
      'app/Cargo.toml': 'a = { path = "../lib" }\nb = { path = "../lib" }\n',
      'lib/Cargo.toml': manifest('lib')
    });

    assert.deepEqual(graph.get('lib')?.dependents, ['app', 'app']);
    assert.deepEqual(findSingleConsumers(graph), []);
    assertEdgesArePaired(graph);
  });

  it('skips excluded subtrees', async () => {
    const graph = await build({
      'app/Cargo.toml': manifest('app'),
      'target/package/app-0.1.0/Cargo.toml': manifest('app')
    }, ['target']);

    assert.deepEqual(graph.projects.map((project) => project.dir), ['app']);
  });

  it('is stable across repeated builds of the same tree', async () => {
    root = await createWorkspace({
      'app/Cargo.toml': manifest('app', ['../libs/core', '../libs/util']),
      'libs/core/Cargo.toml': manifest('core', ['../util']),
      'libs/util/Cargo.toml': manifest('util')
    });
    const options = { rootDir: root, manifestName: 'Cargo.toml', exclude: [] };

    const first = await buildProjectGraph(options);
    const second = await buildProjectGraph(options);

    assert.deepEqual(first.projects, second.projects);
    assertEdgesArePaired(first);
  });
});
