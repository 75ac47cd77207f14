import type { SlimmingPolicy } from '../../recipe/types.js';
import { SlimmingError, errorMessage } from '../../shared/errors.js';
import { tail, type CommandResult } from '../process.js';
import { runSmoke, sameBehavior } from '../smoke.js';
import type { RuntimeImage } from '../types.js';
import type { StageContext } from './context.js';

export function slimArgs(policy: SlimmingPolicy, source: string, target: string): string[] {
  return [
    'build',
    `--http-probe=${policy.http_probe}`,
    `--continue-after=${policy.continue_after}`,
    '--tag',
    target,
    '--target',
    source,
  ];
}

/** Hard bound on the slimming tool: observation window plus grace for image export. */
export function slimTimeoutMs(policy: SlimmingPolicy): number {
  return (policy.continue_after + policy.grace_seconds) * 1000;
}

/**
 * Traces the assembled image and emits a reduced one under `targetRef`.
 * Only code paths exercised during the observation window are guaranteed to
 * survive. Any doubt about the result fails the stage.
 */
export async function runSlimmingStage(
  image: RuntimeImage,
  policy: SlimmingPolicy,
  targetRef: string,
  smoke: string[] | undefined,
  ctx: StageContext,
): Promise<RuntimeImage> {
  const timeoutMs = slimTimeoutMs(policy);
  ctx.log.info('Slimming image', {
    tool: policy.tool,
    source: image.ref,
    target: targetRef,
    continue_after: policy.continue_after,
    http_probe: policy.http_probe,
  });

  let result: CommandResult;
  try {
    result = await ctx.runner.run(policy.tool, slimArgs(policy, image.ref, targetRef), { timeoutMs });
  } catch (err) {
    throw new SlimmingError(`Slimming tool ${policy.tool} failed to start: ${errorMessage(err)}`);
  }
  if (result.timedOut) {
    throw new SlimmingError(`Slimming did not finish within ${timeoutMs / 1000}s`);
  }
  if (result.code !== 0) {
    throw new SlimmingError(
      `Slimming tool exited with code ${result.code}`,
      tail(result.stderr || result.stdout),
    );
  }

  const info = await ctx.docker.inspectImage(targetRef);
  if (!info) {
    throw new SlimmingError(`Slimming tool produced no image at ${targetRef}`);
  }
  if (info.user !== image.user) {
    throw new SlimmingError(`Slimmed image runs as "${info.user || 'root'}", expected "${image.user}"`);
  }
  if (JSON.stringify(info.cmd) !== JSON.stringify(image.command)) {
    throw new SlimmingError(`Slimmed image command ${JSON.stringify(info.cmd)} does not match`);
  }
  if (info.size !== null && image.size !== undefined && info.size > image.size) {
    throw new SlimmingError(`Slimmed image is larger than its input (${info.size} > ${image.size} bytes)`);
  }

  if (smoke) {
    const before = await runSmoke(ctx.docker, image.ref, smoke);
    const after = await runSmoke(ctx.docker, targetRef, smoke);
    if (!sameBehavior(before, after)) {
      throw new SlimmingError(
        `Smoke command behaves differently after slimming (exit ${before.code} -> ${after.code})`,
        tail(after.stderr),
      );
    }
    ctx.log.info('Slimmed image matches smoke behavior', { command: smoke });
  }

  return {
    ...image,
    ref: targetRef,
    slimmed: true,
    ...(info.size !== null ? { size: info.size } : {}),
  };
}
