import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { dump, load } from 'js-yaml';
import type { WorkspaceConfig } from './types.js';
import { WorkspaceConfigSchema } from '../shared/schemas.js';

export function readWorkspaceConfig(configPath: string): WorkspaceConfig {
  if (!existsSync(configPath)) {
    throw new Error(`Workspace not initialized. Run \`imagesmith init\` first.`);
  }
  const parsed = WorkspaceConfigSchema.safeParse(load(readFileSync(configPath, 'utf8')));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid workspace config at ${configPath}: ${issues}`);
  }
  return parsed.data;
}

export function writeWorkspaceConfig(configPath: string, config: WorkspaceConfig): void {
  writeFileSync(configPath, dump(config), 'utf8');
}
