import { mkdirSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { dump } from 'js-yaml';
import { generateId } from '../shared/ids.js';
import { DEFAULT_RECIPE } from '../recipe/defaults.js';
import { getWorkspacePaths } from './paths.js';
import { openDb } from './db.js';
import { writeWorkspaceConfig } from './config.js';
import type { WorkspaceConfig } from './types.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
  /** Recipe file name, relative to cwd. */
  recipe?: string;
  /** Name written into a freshly created recipe. */
  name?: string;
}

export interface InitResult {
  config: WorkspaceConfig;
  recipePath: string;
  recipeCreated: boolean;
}

export function initWorkspace(opts: InitOptions = {}): InitResult {
  const cwd = opts.cwd ?? process.cwd();
  const paths = getWorkspacePaths(cwd);

  if (existsSync(paths.root) && !opts.force) {
    throw new Error(
      `Workspace already exists at ${paths.root}. Use --force to reinitialize.`,
    );
  }

  mkdirSync(paths.root, { recursive: true });
  mkdirSync(paths.scratchDir, { recursive: true });

  const config: WorkspaceConfig = {
    workspace_id: generateId(12),
    created_at: new Date().toISOString(),
    version: '0.1.0',
    recipe: opts.recipe ?? 'imagesmith.yaml',
    docker_bin: 'docker',
  };
  writeWorkspaceConfig(paths.config, config);

  // An existing recipe is never overwritten, even with --force
  const recipePath = join(cwd, config.recipe);
  let recipeCreated = false;
  if (!existsSync(recipePath)) {
    const name = opts.name ?? DEFAULT_RECIPE.name;
    const recipe = {
      ...DEFAULT_RECIPE,
      name,
      build: { ...DEFAULT_RECIPE.build, output: `/app/target/release/${name}` },
    };
    writeFileSync(recipePath, dump(recipe), 'utf8');
    recipeCreated = true;
  }

  openDb(paths.stateDb);
  if (!existsSync(paths.auditLog)) writeFileSync(paths.auditLog, '', 'utf8');

  return { config, recipePath, recipeCreated };
}
