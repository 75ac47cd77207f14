#!/usr/bin/env node
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerRunCommand } from './commands/run.js';
import { registerRenderCommand } from './commands/render.js';
import { registerRunsCommand } from './commands/runs.js';
import { registerAuditCommand } from './commands/audit.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { registerServeCommand } from './commands/serve.js';
import { errorMessage } from '../shared/errors.js';

const program = new Command();

program
  .name('imagesmith')
  .description('imagesmith – build, assemble, slim and publish a minimal runtime image')
  .version('0.1.0');

registerInitCommand(program);
registerRunCommand(program);
registerRenderCommand(program);
registerRunsCommand(program);
registerAuditCommand(program);
registerDoctorCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
