import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import type { CliDeps } from '../cli-shared.js';
import { renderBuilderDockerfile, renderRuntimeDockerfile } from '../../recipe/dockerfile.js';
import { recipePathFor } from '../../runtime/dispatch.js';
import { ProcessRunner } from '../../runtime/process.js';
import { loadRecipeWithRepository } from '../../runtime/repository.js';
import { planAssembly } from '../../runtime/stages/assembly.js';
import { readWorkspaceConfig } from '../../workspace/config.js';
import { getWorkspacePaths } from '../../workspace/paths.js';

interface RenderCommandOptions {
  recipe?: string;
  cwd: string;
  stage: string;
}

/** The workspace's recipe when one is initialized, else imagesmith.yaml. */
function renderRecipePath(cwd: string, recipe: string | undefined): string {
  const paths = getWorkspacePaths(cwd);
  if (existsSync(paths.config)) {
    return recipePathFor({ config: readWorkspaceConfig(paths.config), cwd, recipePath: recipe });
  }
  return resolve(cwd, recipe ?? 'imagesmith.yaml');
}

export function registerRenderCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('render')
    .description('Validate the recipe and print the Dockerfiles it produces')
    .option('--cwd <dir>', 'Project directory', process.cwd())
    .option('--recipe <file>', 'Recipe file (defaults to the workspace setting)')
    .option('--stage <stage>', 'Which Dockerfile to print: build, runtime or all', 'all')
    .action(async (opts: RenderCommandOptions) => {
      if (!['build', 'runtime', 'all'].includes(opts.stage)) {
        throw new Error(`Invalid stage: ${opts.stage}. Use build, runtime or all.`);
      }
      const recipe = await loadRecipeWithRepository(renderRecipePath(opts.cwd, opts.recipe), {
        env: deps.env ?? process.env,
        runner: deps.runner ?? new ProcessRunner(),
        cwd: opts.cwd,
      });

      if (opts.stage !== 'runtime') {
        console.log('# Build stage');
        console.log(renderBuilderDockerfile(recipe.build));
      }
      if (opts.stage !== 'build') {
        // Libraries are only known after the artifact has been resolved
        const plan = planAssembly({ name: recipe.runtime.artifact_name, dependencies: [] }, recipe.runtime);
        console.log('# Runtime stage (shared libraries are added after dependency resolution)');
        console.log(renderRuntimeDockerfile(plan));
      }
    });
}
