import { existsSync, mkdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { BUILDER_STAGE, renderBuilderDockerfile } from '../../recipe/dockerfile.js';
import type { BuildSpec } from '../../recipe/types.js';
import { CompileError, errorMessage } from '../../shared/errors.js';
import { sha256 } from '../../shared/redact.js';
import { tail, type CommandResult } from '../process.js';
import type { Artifact } from '../types.js';
import type { StageContext } from './context.js';

/**
 * The throwaway builder: its image and the stopped container the artifact was
 * copied from. Must be disposed before assembly starts.
 */
export interface BuildEnvironment {
  image: string;
  container: string;
  dispose(): Promise<void>;
}

export interface BuildStageResult {
  artifact: Artifact;
  env: BuildEnvironment;
}

export interface BuildStageOptions {
  /** Absolute path of the build context directory. */
  contextDir: string;
  artifactName: string;
}

export function builderImageTag(runId: string): string {
  return `imagesmith-build:${runId}`;
}

export async function runBuildStage(
  spec: BuildSpec,
  opts: BuildStageOptions,
  ctx: StageContext,
): Promise<BuildStageResult> {
  const image = builderImageTag(ctx.runId);
  const container = `imagesmith-extract-${ctx.runId}`;
  const dockerfile = renderBuilderDockerfile(spec);

  ctx.log.info('Compiling in builder image', { toolchain: spec.image, tag: image });

  let result: CommandResult;
  try {
    result = await ctx.docker.build({
      dockerfile,
      context: opts.contextDir,
      tag: image,
      target: BUILDER_STAGE,
    });
  } catch (err) {
    throw new CompileError(`Failed to start docker build: ${errorMessage(err)}`, null);
  }
  if (result.code !== 0) {
    throw new CompileError(
      `Compile step failed with exit code ${result.code}`,
      result.code,
      tail(result.stderr || result.stdout),
    );
  }

  const env: BuildEnvironment = {
    image,
    container,
    dispose: async () => {
      for (const cleanup of [
        () => ctx.docker.removeContainer(container),
        () => ctx.docker.removeImage(image),
      ]) {
        try {
          const res = await cleanup();
          if (res.code !== 0) {
            ctx.log.warn('Builder cleanup command failed', { stderr: tail(res.stderr, 3) });
          }
        } catch (err) {
          ctx.log.warn('Builder cleanup command failed', { error: errorMessage(err) });
        }
      }
      ctx.log.debug('Builder environment disposed', { image });
    },
  };

  try {
    const artifact = await extractArtifact(spec, opts.artifactName, env, ctx);
    ctx.log.info('Artifact extracted', { name: artifact.name, sha256: artifact.sha256, size: artifact.size });
    return { artifact, env };
  } catch (err) {
    await env.dispose();
    throw err;
  }
}

async function extractArtifact(
  spec: BuildSpec,
  name: string,
  env: BuildEnvironment,
  ctx: StageContext,
): Promise<Artifact> {
  const created = await ctx.docker.createContainer(env.image, env.container);
  if (created.code !== 0) {
    throw new CompileError('Failed to create extraction container', created.code, tail(created.stderr));
  }

  const artifactDir = join(ctx.scratchDir, 'artifact');
  mkdirSync(artifactDir, { recursive: true });
  const hostPath = join(artifactDir, name);

  const copied = await ctx.docker.copyFromContainer(env.container, spec.output, hostPath);
  if (copied.code !== 0 || !existsSync(hostPath)) {
    throw new CompileError(
      `Build produced no artifact at ${spec.output}`,
      copied.code,
      tail(copied.stderr),
    );
  }

  const contents = readFileSync(hostPath);
  return {
    name,
    build_path: spec.output,
    host_path: hostPath,
    sha256: sha256(contents),
    size: statSync(hostPath).size,
    dependencies: [],
  };
}
