import { mkdtemp, mkdir, writeFile, rm, realpath } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { OutputPort } from '../src/core/ports/output.js';

/**
 * Layout of a throwaway workspace: keys are paths relative to the root.
 * A key ending in `/` creates an empty directory, any other key a file with
 * the given content.
 */
export type WorkspaceLayout = Record<string, string>;

export async function createWorkspace(layout: WorkspaceLayout): Promise<string> {
  const root = await realpath(await mkdtemp(path.join(tmpdir(), 'pathdeps-test-')));
  for (const [relPath, content] of Object.entries(layout)) {
    const target = path.join(root, relPath);
    if (relPath.endsWith('/')) {
      await mkdir(target, { recursive: true });
    } else {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content, 'utf8');
    }
  }
  return root;
}

export async function removeWorkspace(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/**
 * Manifest with one `name = { path = "..." }` line per dependency
 */
export function manifest(name: string, pathDeps: string[] = []): string {
  const lines = ['[package]', `name = "${name}"`, 'version = "0.1.0"', '', '[dependencies]'];
  for (const dep of pathDeps) {
    lines.push(`${path.basename(dep)} = { path = "${dep}" }`);
  }
  return `${lines.join('\n')}\n`;
}

export interface CapturedOutput extends OutputPort {
  lines: string[];
}

export function captureOutput(): CapturedOutput {
  const lines: string[] = [];
  return {
    lines,
    message: (message) => lines.push(message)
  };
}
