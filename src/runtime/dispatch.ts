import { dirname, isAbsolute, join } from 'node:path';
import type Database from 'better-sqlite3';
import type { Recipe } from '../recipe/types.js';
import type { WorkspaceConfig, WorkspacePaths } from '../workspace/types.js';
import type { CommandRunner } from './process.js';
import { buildPublishTarget, loadRecipeWithRepository, resolveRepository } from './repository.js';
import type { PipelineContext } from './runner.js';
import { evaluateTrigger, type TriggerDecision, type TriggerEvent } from './triggers.js';

export interface DispatchOptions {
  db: Database.Database;
  config: WorkspaceConfig;
  paths: WorkspacePaths;
  /** Project root: the recipe path and the git checkout are relative to it. */
  cwd: string;
  runner: CommandRunner;
  env: NodeJS.ProcessEnv;
  /** Overrides the workspace's recipe path. */
  recipePath?: string;
  slim?: boolean;
  dryRun?: boolean;
  actor?: string;
  runId?: string;
}

export type Dispatch =
  | { run: false; decision: TriggerDecision; recipe: Recipe }
  | { run: true; decision: TriggerDecision; recipe: Recipe; context: PipelineContext };

export function recipePathFor(opts: Pick<DispatchOptions, 'config' | 'cwd' | 'recipePath'>): string {
  const path = opts.recipePath ?? opts.config.recipe;
  return isAbsolute(path) ? path : join(opts.cwd, path);
}

/**
 * Turns a trigger event into a ready-to-run pipeline. Push and manual events
 * go through the same recipe and the same context; only the trigger label
 * differs.
 */
export async function planDispatch(event: TriggerEvent, opts: DispatchOptions): Promise<Dispatch> {
  const recipePath = recipePathFor(opts);
  const recipe = await loadRecipeWithRepository(recipePath, {
    env: opts.env,
    runner: opts.runner,
    cwd: opts.cwd,
  });
  const decision = evaluateTrigger(event, recipe.triggers);
  if (!decision.run) return { run: false, decision, recipe };

  const repository = await resolveRepository(recipe.publish, {
    env: opts.env,
    runner: opts.runner,
    cwd: opts.cwd,
  });

  const context: PipelineContext = {
    db: opts.db,
    workspaceId: opts.config.workspace_id,
    auditLogPath: opts.paths.auditLog,
    runner: opts.runner,
    dockerBin: opts.config.docker_bin,
    recipeDir: dirname(recipePath),
    target: buildPublishTarget(recipe.publish, repository),
    trigger: decision.trigger,
    scratchRoot: opts.config.scratch_dir ?? opts.paths.scratchDir,
    env: opts.env,
    slim: opts.slim,
    dryRun: opts.dryRun,
    actor: opts.actor,
    runId: opts.runId,
  };
  return { run: true, decision, recipe, context };
}
