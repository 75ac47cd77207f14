import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';

interface InitCommandOptions {
  cwd: string;
  force: boolean;
  recipe?: string;
  name?: string;
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize an imagesmith workspace and a starter recipe in the current directory')
    .option('--cwd <dir>', 'Project directory', process.cwd())
    .option('--force', 'Reinitialize even if workspace already exists', false)
    .option('--recipe <file>', 'Recipe file name, relative to the project directory')
    .option('--name <name>', 'Image name written into a new recipe')
    .action((opts: InitCommandOptions) => {
      console.log('Initializing workspace...');

      const result = initWorkspace({
        cwd: opts.cwd,
        force: opts.force,
        recipe: opts.recipe,
        name: opts.name,
      });

      console.log(`\nWorkspace initialized!`);
      console.log(`  Workspace ID: ${result.config.workspace_id}`);
      console.log(
        `  Recipe:       ${result.recipePath}${result.recipeCreated ? ' (created)' : ' (existing, left unchanged)'}`,
      );
      console.log(`\nNext steps:`);
      console.log(`  imagesmith doctor         – check docker, the slimming tool and credentials`);
      console.log(`  imagesmith render         – print the Dockerfiles the recipe produces`);
      console.log(`  imagesmith run --dry-run  – build, assemble and slim without pushing`);
    });
}
