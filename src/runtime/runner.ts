import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import type Database from 'better-sqlite3';
import { appendAuditEntry } from '../audit/audit.js';
import type { Recipe } from '../recipe/types.js';
import {
  AssemblyError,
  CompileError,
  PushError,
  SlimmingError,
  errorMessage,
  isPipelineError,
  type PipelineError,
} from '../shared/errors.js';
import { generateRunId } from '../shared/ids.js';
import { logger, type Logger } from '../shared/logger.js';
import { redact } from '../shared/redact.js';
import { readRegistryCredential } from './credentials.js';
import { DockerClient } from './docker.js';
import type { CommandRunner } from './process.js';
import { finishRun, insertRun, updateRunState } from './run-store.js';
import { runAssemblyStage, runtimeImageTag } from './stages/assembly.js';
import { runBuildStage } from './stages/build.js';
import type { StageContext } from './stages/context.js';
import { publishRef, runPublishStage } from './stages/publish.js';
import { resolveDependencies } from './stages/resolver.js';
import { runSlimmingStage } from './stages/slimming.js';
import { PipelineStateMachine } from './state.js';
import type { Artifact, PipelineState, PublishTarget, RunResult, RuntimeImage, TriggerKind } from './types.js';

export interface PipelineContext {
  db: Database.Database;
  workspaceId: string;
  /** JSONL mirror of the audit journal; null to keep it in the DB only. */
  auditLogPath: string | null;
  runner: CommandRunner;
  dockerBin?: string;
  /** Directory the recipe was loaded from; build.context is relative to it. */
  recipeDir: string;
  target: PublishTarget;
  trigger: TriggerKind;
  /** Where per-run scratch dirs are created. Defaults to the OS temp dir. */
  scratchRoot?: string;
  /** Source of the registry credential, read only by the publish stage. */
  env?: NodeJS.ProcessEnv;
  /** Overrides recipe.slim.enabled. */
  slim?: boolean;
  dryRun?: boolean;
  actor?: string;
  /** Pre-assigned run ID, so a caller can report it before the run ends. */
  runId?: string;
}

// A stage that throws something other than a PipelineError fails with its own kind
function asStageError(state: PipelineState, err: unknown): PipelineError {
  if (isPipelineError(err)) return err;
  const message = errorMessage(err);
  switch (state) {
    case 'assembling':
      return new AssemblyError(message);
    case 'slimming':
      return new SlimmingError(message);
    case 'publishing':
      return new PushError(message);
    default:
      return new CompileError(message, null);
  }
}

/**
 * Runs one recipe through build -> assemble -> (slim) -> publish. Each stage
 * consumes only its predecessor's result; the first failure ends the run.
 * Never retries, and never publishes an image that did not finish every
 * configured stage.
 */
export async function runPipeline(recipe: Recipe, ctx: PipelineContext): Promise<RunResult> {
  const runId = ctx.runId ?? generateRunId();
  const startedAt = new Date().toISOString();
  const actor = ctx.actor ?? ctx.trigger;
  const dryRun = ctx.dryRun ?? false;
  const slimEnabled = ctx.slim ?? recipe.slim.enabled;
  const log = logger.child({ run_id: runId, recipe: recipe.name });

  insertRun(ctx.db, {
    id: runId,
    workspace_id: ctx.workspaceId,
    recipe: recipe.name,
    trigger: ctx.trigger,
    dry_run: dryRun,
    started_at: startedAt,
  });

  const machine = new PipelineStateMachine();
  const enter = (to: PipelineState, input: unknown, errorKind?: string) => {
    const from = machine.state;
    machine.transition(to, errorKind);
    updateRunState(ctx.db, runId, to);
    appendAuditEntry(ctx.db, ctx.auditLogPath, {
      actor,
      workspace_id: ctx.workspaceId,
      run_id: runId,
      from_state: from,
      to_state: to,
      input,
      ...(errorKind ? { error_kind: errorKind } : {}),
      dry_run: dryRun,
    });
    log.info('Pipeline state changed', { from, to });
  };

  const docker = new DockerClient(ctx.runner, ctx.dockerBin);
  let scratchDir: string | undefined;
  const stageCtx = (stage: string, dir: string): StageContext => ({
    runId,
    scratchDir: dir,
    docker,
    runner: ctx.runner,
    log: log.child({ stage }),
  });

  // Set once the runtime image may exist, even if assembly then fails
  let runtimeTagged = false;
  let artifact: Artifact | undefined;
  let image: RuntimeImage | undefined;
  let imageRef: string | undefined;
  let fellBack = false;
  let failure: PipelineError | undefined;

  log.info('Run started', { trigger: ctx.trigger, dry_run: dryRun, slim: slimEnabled });

  try {
    enter('building', { build: recipe.build, runtime_base: recipe.runtime.base });
    const scratchRoot = ctx.scratchRoot ?? tmpdir();
    mkdirSync(scratchRoot, { recursive: true });
    const scratch = mkdtempSync(join(scratchRoot, `imagesmith-${runId}-`));
    scratchDir = scratch;

    const contextDir = isAbsolute(recipe.build.context)
      ? recipe.build.context
      : resolve(ctx.recipeDir, recipe.build.context);
    const build = await runBuildStage(
      recipe.build,
      { contextDir, artifactName: recipe.runtime.artifact_name },
      stageCtx('build', scratch),
    );
    try {
      const dependencies = await resolveDependencies(
        build.artifact,
        recipe.runtime,
        build.env,
        stageCtx('resolve', scratch),
      );
      artifact = { ...build.artifact, dependencies };
    } finally {
      await build.env.dispose();
    }

    enter('assembling', {
      artifact_sha256: artifact.sha256,
      dependencies: artifact.dependencies.map((d) => d.runtime_path),
      runtime: recipe.runtime,
    });
    runtimeTagged = true;
    image = await runAssemblyStage(artifact, recipe.runtime, stageCtx('assemble', scratch));

    const targetRef = publishRef(ctx.target);
    if (slimEnabled) {
      enter('slimming', { image: image.ref, policy: recipe.slim });
      try {
        image = await runSlimmingStage(image, recipe.slim, targetRef, recipe.runtime.smoke, stageCtx('slim', scratch));
      } catch (err) {
        if (!(err instanceof SlimmingError) || !recipe.slim.fallback_to_unslimmed) throw err;
        fellBack = true;
        log.warn('Slimming failed; publishing the unslimmed image', { error: err.message });
      }
    }

    enter('publishing', {
      image: image.ref,
      slimmed: image.slimmed,
      target: { registry: ctx.target.registry, repository: ctx.target.repository, tag: ctx.target.tag },
    });
    // Credential lives only inside this block
    {
      const credential = dryRun ? null : readRegistryCredential(ctx.target, ctx.env ?? process.env);
      imageRef = await runPublishStage(image, ctx.target, credential, stageCtx('publish', scratch), { dryRun });
    }

    enter('done', { image_ref: imageRef });
  } catch (err) {
    failure = asStageError(machine.state, err);
    log.error('Run failed', {
      stage: machine.state,
      error_kind: failure.kind,
      error: failure.message,
      ...(failure.detail ? { detail: failure.detail } : {}),
    });
    enter('failed', { error_kind: failure.kind }, failure.kind);
  } finally {
    if (scratchDir) rmSync(scratchDir, { recursive: true, force: true });
    if (runtimeTagged && !dryRun) {
      await untag(docker, runtimeImageTag(runId), log);
    }
  }

  const endedAt = new Date().toISOString();
  const state = failure ? 'failed' : 'done';
  const errorText = failure ? redact(failure.message) : undefined;

  finishRun(ctx.db, runId, {
    state,
    error_kind: failure?.kind ?? null,
    error: errorText ?? null,
    image_ref: imageRef ?? null,
    slimmed: image?.slimmed ?? false,
    fell_back: fellBack,
    ended_at: endedAt,
  });

  log.info('Run completed', { state, ...(imageRef ? { image_ref: imageRef } : {}) });

  return {
    run_id: runId,
    recipe: recipe.name,
    trigger: ctx.trigger,
    state,
    ...(failure ? { error_kind: failure.kind, error: errorText } : {}),
    ...(artifact ? { artifact } : {}),
    ...(image ? { image } : {}),
    ...(imageRef ? { image_ref: imageRef } : {}),
    slimmed: image?.slimmed ?? false,
    fell_back: fellBack,
    transitions: machine.transitions,
    started_at: startedAt,
    ended_at: endedAt,
  };
}

async function untag(docker: DockerClient, ref: string, log: Logger): Promise<void> {
  try {
    const result = await docker.removeImage(ref);
    if (result.code !== 0) log.debug('Could not remove intermediate image', { ref });
  } catch (err) {
    log.debug('Could not remove intermediate image', { ref, error: errorMessage(err) });
  }
}
