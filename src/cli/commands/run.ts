import type { Command } from 'commander';
import { requireWorkspace, type CliDeps } from '../cli-shared.js';
import { planDispatch } from '../../runtime/dispatch.js';
import { ProcessRunner } from '../../runtime/process.js';
import { runPipeline } from '../../runtime/runner.js';
import type { TriggerEvent } from '../../runtime/triggers.js';
import type { RunResult } from '../../runtime/types.js';
import { safeStringify } from '../../shared/redact.js';

interface RunCommandOptions {
  cwd: string;
  recipe?: string;
  event: string;
  ref?: string;
  slim: boolean;
  dryRun: boolean;
  json: boolean;
}

function toEvent(opts: RunCommandOptions, env: NodeJS.ProcessEnv): TriggerEvent {
  if (opts.event === 'manual') return { kind: 'manual' };
  if (opts.event === 'push') {
    const ref = opts.ref ?? env['GITHUB_REF'];
    if (!ref) throw new Error('--event push needs --ref (or GITHUB_REF), e.g. refs/heads/main');
    return { kind: 'push', ref };
  }
  throw new Error(`Invalid event: ${opts.event}. Use "manual" or "push".`);
}

function printResult(result: RunResult): void {
  console.log(`\nRun ${result.run_id}: ${result.state}`);
  for (const t of result.transitions) {
    const mark = t.to === 'failed' ? '[fail]' : '[ok]';
    console.log(`  ${mark} ${t.from} -> ${t.to}`);
  }
  if (result.image_ref) {
    console.log(`\nPublished: ${result.image_ref}${result.slimmed ? ' (slimmed)' : ''}`);
  }
  if (result.fell_back) console.log('  Slimming failed; the unslimmed image was published');
  if (result.error) {
    console.log(`\nError (${result.error_kind ?? 'unknown'}): ${result.error}`);
  }
}

export function registerRunCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('run')
    .description('Build, assemble, slim and publish the runtime image described by the recipe')
    .option('--cwd <dir>', 'Project directory', process.cwd())
    .option('--recipe <file>', 'Recipe file (defaults to the workspace setting)')
    .option('--event <kind>', 'Trigger event: manual or push', 'manual')
    .option('--ref <ref>', 'Git ref for --event push (defaults to GITHUB_REF)')
    .option('--no-slim', 'Skip the slimming stage')
    .option('--dry-run', 'Run every stage except the registry push', false)
    .option('--json', 'Print the run result as JSON', false)
    .action(async (opts: RunCommandOptions) => {
      const env = deps.env ?? process.env;
      const runner = deps.runner ?? new ProcessRunner();
      const { cwd, paths, config, db } = requireWorkspace(opts.cwd);

      const dispatch = await planDispatch(toEvent(opts, env), {
        db,
        config,
        paths,
        cwd,
        runner,
        env,
        recipePath: opts.recipe,
        slim: opts.slim ? undefined : false,
        dryRun: opts.dryRun,
        actor: 'cli',
      });

      if (!dispatch.run) {
        console.log(`Skipped: ${dispatch.decision.reason}`);
        return;
      }

      if (!opts.json) {
        console.log(`Running ${dispatch.recipe.name} (${dispatch.decision.reason})`);
        if (opts.dryRun) console.log('[DRY RUN] – the image will not be pushed');
      }

      const result = await runPipeline(dispatch.recipe, dispatch.context);
      if (opts.json) {
        console.log(safeStringify(result, 2));
      } else {
        printResult(result);
      }
      if (result.state === 'failed') process.exitCode = 1;
    });
}
