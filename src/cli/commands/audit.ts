import type { Command } from 'commander';
import { requireWorkspace } from '../cli-shared.js';
import { verifyAuditChain } from '../../audit/audit.js';

export function registerAuditCommand(program: Command): void {
  const audit = program.command('audit').description('Inspect the run audit journal');

  audit
    .command('verify')
    .description('Verify the hash chain of every recorded state transition')
    .option('--cwd <dir>', 'Project directory', process.cwd())
    .action((opts: { cwd: string }) => {
      const { config, db } = requireWorkspace(opts.cwd);
      const result = verifyAuditChain(db, config.workspace_id);
      if (result.valid) {
        console.log(`Audit chain intact (${result.entries} entries)`);
        return;
      }
      console.error(`Audit chain broken at entry ${result.broken_at ?? '?'} (${result.entries} entries)`);
      process.exitCode = 1;
    });
}
