import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ProjectRegistry } from '../../../src/core/dependency-graph/registry.js';
import { linkProject } from '../../../src/core/dependency-graph/linker.js';
import {
  buildGraphReport,
  displayGraphReport,
  formatReportJson,
  formatTree
} from '../../../src/core/dependency-graph/display.js';
import { walkDependencyTree } from '../../../src/core/dependency-graph/queries.js';
import { captureOutput } from '../../test-helpers.js';

function chainGraph() {
  const registry = new ProjectRegistry();
  for (const dir of ['a', 'b', 'c']) {
    registry.register(`${dir}/Cargo.toml`);
  }
  linkProject(registry, 'a', ['b']);
  linkProject(registry, 'b', ['c']);
  return registry.freeze();
}

describe('graph report display', () => {
  const graph = chainGraph();

  it('prints the three sections in order', () => {
    const output = captureOutput();
    const report = buildGraphReport(graph, ['unused', 'single', 'tree'], 'a');

    displayGraphReport(report, { output });

    assert.deepEqual(output.lines, [
      '[unneeded]',
      '* a',
      '[needed by only 1]',
      '[1] b [a]',
      '[1] c [b]',
      '* a',
      '  * b',
      '    * c'
    ]);
  });

  it('omits the tree when no root is given', () => {
    const output = captureOutput();
    const report = buildGraphReport(graph, ['unused', 'single', 'tree']);

    displayGraphReport(report, { output });

    assert.equal(report.tree, null);
    assert.deepEqual(output.lines, ['[unneeded]', '* a', '[needed by only 1]', '[1] b [a]', '[1] c [b]']);
  });

  it('prints only the requested sections', () => {
    const output = captureOutput();

    displayGraphReport(buildGraphReport(graph, ['single']), { output });

    assert.deepEqual(output.lines, ['[needed by only 1]', '[1] b [a]', '[1] c [b]']);
  });

  it('indents the tree by two spaces per level', () => {
    assert.deepEqual(formatTree(walkDependencyTree(graph, 'b')), ['* b', '  * c']);
  });

  it('renders JSON with the requested sections only', () => {
    const report = buildGraphReport(graph, ['unused', 'tree'], 'b');

    assert.deepEqual(JSON.parse(formatReportJson(report)), {
      unused: ['a'],
      tree: [{ project: 'b', depth: 0 }, { project: 'c', depth: 1 }]
    });
    assert.deepEqual(JSON.parse(formatReportJson(buildGraphReport(graph, ['single', 'tree']))), {
      singleConsumers: [{ project: 'b', dependent: 'a' }, { project: 'c', dependent: 'b' }],
      tree: null
    });
  });

  it('prints JSON as a single message', () => {
    const output = captureOutput();

    displayGraphReport(buildGraphReport(graph, ['unused']), { json: true, output });

    assert.deepEqual(output.lines, ['{\n  "unused": [\n    "a"\n  ]\n}']);
  });
});
