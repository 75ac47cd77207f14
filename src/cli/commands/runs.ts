import type { Command } from 'commander';
import { parseIntOption, requireWorkspace } from '../cli-shared.js';
import { getRun, listRuns } from '../../runtime/run-store.js';
import { listRunEvents } from '../../audit/audit.js';

interface RunsCommandOptions {
  cwd: string;
  limit: string;
}

export function registerRunsCommand(program: Command): void {
  program
    .command('runs [id]')
    .description('List recent runs, or show one run with its state transitions')
    .option('--cwd <dir>', 'Project directory', process.cwd())
    .option('--limit <n>', 'Number of runs to list', '20')
    .action((id: string | undefined, opts: RunsCommandOptions) => {
      const { config, db } = requireWorkspace(opts.cwd);

      if (id) {
        const run = getRun(db, config.workspace_id, id);
        if (!run) throw new Error(`Run not found: ${id}`);
        console.log(`Run ${run.id}`);
        console.log(`  Recipe:   ${run.recipe}`);
        console.log(`  Trigger:  ${run.trigger}${run.dry_run ? ' (dry run)' : ''}`);
        console.log(`  State:    ${run.state}`);
        console.log(`  Started:  ${run.started_at}`);
        if (run.ended_at) console.log(`  Ended:    ${run.ended_at}`);
        if (run.image_ref) console.log(`  Image:    ${run.image_ref}${run.slimmed ? ' (slimmed)' : ''}`);
        if (run.error) console.log(`  Error:    [${run.error_kind ?? 'unknown'}] ${run.error}`);
        console.log('\nTransitions:');
        for (const event of listRunEvents(db, run.id)) {
          console.log(`  ${event.timestamp}  ${event.from_state} -> ${event.to_state}`);
        }
        return;
      }

      const runs = listRuns(db, config.workspace_id, parseIntOption(opts.limit, '--limit'));
      if (runs.length === 0) {
        console.log('No runs yet.');
        return;
      }
      for (const run of runs) {
        const status = run.error_kind ? `${run.state} (${run.error_kind})` : run.state;
        console.log(`${run.id}  ${run.started_at}  ${run.trigger.padEnd(6)}  ${status}`);
      }
    });
}
