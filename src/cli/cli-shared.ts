import type Database from 'better-sqlite3';
import { getWorkspacePaths } from '../workspace/paths.js';
import { readWorkspaceConfig } from '../workspace/config.js';
import { openDb } from '../workspace/db.js';
import type { WorkspaceConfig, WorkspacePaths } from '../workspace/types.js';
import type { CommandRunner } from '../runtime/process.js';

export interface WorkspaceContext {
  cwd: string;
  paths: WorkspacePaths;
  config: WorkspaceConfig;
  db: Database.Database;
}

/** Seams the commands use for the outside world; tests replace them. */
export interface CliDeps {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load workspace config and open db, or throw.
 * Use at the top of every CLI command that requires an initialized workspace.
 */
export function requireWorkspace(cwd: string = process.cwd()): WorkspaceContext {
  const paths = getWorkspacePaths(cwd);
  let config: WorkspaceConfig;
  try {
    config = readWorkspaceConfig(paths.config);
  } catch {
    throw new Error(`Workspace not initialized in ${cwd}. Run: imagesmith init`);
  }
  const db = openDb(paths.stateDb);
  return { cwd, paths, config, db };
}

export function parseIntOption(value: string, name: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) throw new Error(`${name} must be a non-negative integer`);
  return n;
}
