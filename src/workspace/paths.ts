import { join } from 'node:path';
import type { WorkspacePaths } from './types.js';

export const WORKSPACE_DIR = '.imagesmith';

export function getWorkspacePaths(cwd: string = process.cwd()): WorkspacePaths {
  const root = join(cwd, WORKSPACE_DIR);
  return {
    root,
    config: join(root, 'config.yaml'),
    stateDb: join(root, 'state.db'),
    auditLog: join(root, 'audit.log'),
    scratchDir: join(root, 'tmp'),
  };
}
