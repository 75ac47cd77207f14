import type { Command } from 'commander';
import type { CliDeps } from '../cli-shared.js';
import { runDoctorChecks } from '../../runtime/doctor.js';

const COLORS = { pass: '\x1b[32m', warn: '\x1b[33m', fail: '\x1b[31m' } as const;
const ICONS = { pass: '✓', warn: '⚠', fail: '✗' } as const;
const RESET = '\x1b[0m';

export function registerDoctorCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('doctor')
    .description('Check the workspace, recipe, docker, slimming tool and registry credentials')
    .option('--cwd <dir>', 'Project directory', process.cwd())
    .action(async (opts: { cwd: string }) => {
      console.log('Running imagesmith environment checks...\n');

      const report = await runDoctorChecks({ cwd: opts.cwd, runner: deps.runner, env: deps.env });

      for (const check of report.checks) {
        console.log(`${COLORS[check.status]}${ICONS[check.status]} ${check.name}${RESET}`);
        console.log(`  ${check.message}`);
        if (check.fix) console.log(`  Fix: ${check.fix}`);
        console.log();
      }

      console.log(
        `${COLORS[report.overall]}Overall: ${report.overall.toUpperCase()} – ${report.summary}${RESET}`,
      );

      if (report.overall === 'fail') process.exitCode = 1;
    });
}
