import type { z } from 'zod';
import type { WorkspaceConfigSchema } from '../shared/schemas.js';

export type WorkspaceConfig = z.output<typeof WorkspaceConfigSchema>;

export interface WorkspacePaths {
  root: string;      // .imagesmith/
  config: string;    // .imagesmith/config.yaml
  stateDb: string;   // .imagesmith/state.db
  auditLog: string;  // .imagesmith/audit.log
  scratchDir: string; // .imagesmith/tmp/
}
