import type Database from 'better-sqlite3';
import type { WorkspaceConfig, WorkspacePaths } from '../workspace/types.js';
import type { CommandRunner } from '../runtime/process.js';
import type { RunResult } from '../runtime/types.js';

export interface RouteOpts {
  db: Database.Database;
  config: WorkspaceConfig;
  paths: WorkspacePaths;
  /** Project root the recipe and git checkout live in. */
  cwd: string;
  runner: CommandRunner;
  env: NodeJS.ProcessEnv;
  /** Starts a run in the background and tracks it until it settles. */
  track: (run: Promise<RunResult>) => void;
}
