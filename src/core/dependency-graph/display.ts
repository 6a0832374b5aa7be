/**
 * Display utilities for dependency graph reports.
 */

import type { ProjectGraph, ProjectNode, SingleConsumer, TreeEntry } from './types.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { findSingleConsumers, findUnused, resolveProject, walkDependencyTree } from './queries.js';
import { REPORT_HEADERS, TREE_INDENT } from '../../constants/index.js';

export type ReportSection = 'unused' | 'single' | 'tree';

export interface GraphReport {
  unused?: ProjectNode[];
  singleConsumers?: SingleConsumer[];
  /** null when the tree was requested but no root was configured */
  tree?: TreeEntry[] | null;
}

export interface DisplayOptions {
  json?: boolean;
  output?: OutputPort;
}

/**
 * Run the queries behind the requested report sections
 */
export function buildGraphReport(graph: ProjectGraph, sections: readonly ReportSection[], root?: string): GraphReport {
  const report: GraphReport = {};
  if (sections.includes('unused')) {
    report.unused = findUnused(graph);
  }
  if (sections.includes('single')) {
    report.singleConsumers = findSingleConsumers(graph);
  }
  if (sections.includes('tree')) {
    report.tree = root === undefined ? null : walkDependencyTree(graph, resolveProject(graph, root).dir);
  }
  return report;
}

const SECTION_FORMATS: Record<ReportSection, readonly string[]> = {
  unused: [REPORT_HEADERS.UNUSED, '* <dir>                   a project nothing depends on'],
  single: [REPORT_HEADERS.SINGLE_CONSUMER, '[1] <dir> [<dependent>]   a project with exactly one dependent'],
  tree: ['* <dir>                   the root, then its dependencies indented two spaces per level']
};

/**
 * Help text describing the text report lines of the given sections
 */
export function describeReportFormat(sections: readonly ReportSection[]): string {
  const lines = ['', 'Output:'];
  for (const section of sections) {
    lines.push(...SECTION_FORMATS[section].map((line) => `  ${line}`));
  }
  return lines.join('\n');
}

export function formatUnused(unused: readonly ProjectNode[]): string[] {
  return [REPORT_HEADERS.UNUSED, ...unused.map((project) => `* ${project.dir}`)];
}

export function formatSingleConsumers(singleConsumers: readonly SingleConsumer[]): string[] {
  return [
    REPORT_HEADERS.SINGLE_CONSUMER,
    ...singleConsumers.map(({ project, dependent }) => `[1] ${project.dir} [${dependent}]`)
  ];
}

export function formatTree(entries: readonly TreeEntry[]): string[] {
  return entries.map(({ project, depth }) => `${TREE_INDENT.repeat(depth)}* ${project.dir}`);
}

/**
 * JSON rendering; only the sections present in the report are emitted
 */
export function formatReportJson(report: GraphReport): string {
  const json: Record<string, unknown> = {};
  if (report.unused) {
    json.unused = report.unused.map((project) => project.dir);
  }
  if (report.singleConsumers) {
    json.singleConsumers = report.singleConsumers.map(({ project, dependent }) => ({
      project: project.dir,
      dependent
    }));
  }
  if (report.tree !== undefined) {
    json.tree = report.tree === null
      ? null
      : report.tree.map(({ project, depth }) => ({ project: project.dir, depth }));
  }
  return JSON.stringify(json, null, 2);
}

/**
 * Print a report, sections in fixed order: unused, single consumer, tree
 */
export function displayGraphReport(report: GraphReport, options: DisplayOptions = {}): void {
  const out = resolveOutput(options);

  if (options.json) {
    out.message(formatReportJson(report));
    return;
  }

  const lines: string[] = [];
  if (report.unused) {
    lines.push(...formatUnused(report.unused));
  }
  if (report.singleConsumers) {
    lines.push(...formatSingleConsumers(report.singleConsumers));
  }
  if (report.tree) {
    lines.push(...formatTree(report.tree));
  }
  for (const line of lines) {
    out.message(line);
  }
}
