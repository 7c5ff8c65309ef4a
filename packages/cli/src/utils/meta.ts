/**
 * JSON meta helper for CLI outputs
 */

import { VERSION } from '@wikiport/core';
import type { ProjectContext } from './context.js';

export interface MetaBlock {
  tool: {
    name: string;
    version: string;
    root: string;
    execPath: string;
    runtime: string;
  };
  context: {
    cwd: string;
    dbPath: string;
    command: string;
    timestamp: string;
  };
}

export function buildMeta(project: ProjectContext, command?: string): MetaBlock {
  return {
    tool: {
      name: 'wikiport',
      version: VERSION,
      root: project.projectRoot,
      execPath: process.execPath,
      runtime: `Node.js ${process.version}`,
    },
    context: {
      cwd: process.cwd(),
      dbPath: project.dbPath,
      command: command ?? process.argv.slice(2).join(' '),
      timestamp: new Date().toISOString(),
    },
  };
}

export function withMeta<T extends object>(data: T, meta: MetaBlock | null): T | (T & { meta: MetaBlock }) {
  return meta ? { meta, ...data } : data;
}

/**
 * Print a JSON result, with the meta block unless --no-meta was given
 */
export function printJson<T extends object>(data: T, project: ProjectContext, includeMeta: boolean = true): void {
  console.log(JSON.stringify(withMeta(data, includeMeta ? buildMeta(project) : null), null, 2));
}
