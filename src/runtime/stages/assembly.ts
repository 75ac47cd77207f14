import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { join, posix } from 'node:path';
import { renderRuntimeDockerfile } from '../../recipe/dockerfile.js';
import type { RuntimeSpec } from '../../recipe/types.js';
import { AssemblyError, errorMessage } from '../../shared/errors.js';
import { directEntryPaths } from '../../shared/schemas.js';
import { tail, type CommandResult } from '../process.js';
import { runSmoke } from '../smoke.js';
import type { Artifact, AssemblyPlan, ImageFile, RuntimeImage } from '../types.js';
import type { StageContext } from './context.js';

// Compilers, linkers, and package managers never go into a runtime image
const BUILD_ONLY_FILES = [
  /^(cc|c\+\+|gcc|g\+\+|clang|clang\+\+|rustc|cargo|rustup|go|javac|ld|as|make|cmake)(-[\d.]+)?$/,
  /^(apt|apt-get|dpkg|yum|dnf|rpm|apk|pip[\d.]*|npm|gem)$/,
];

export function isBuildOnlyFile(path: string): boolean {
  const name = posix.basename(path);
  return BUILD_ONLY_FILES.some((pattern) => pattern.test(name));
}

export function runtimeImageTag(runId: string): string {
  return `imagesmith-runtime:${runId}`;
}

// Checks every directory in one container run; prints the ones missing
const MISSING_DIRS_SCRIPT = 'for d in "$@"; do [ -d "$d" ] || echo "$d"; done';

export function assertUnprivileged(runtime: Pick<RuntimeSpec, 'user' | 'uid'>): void {
  if (runtime.user === 'root' || runtime.user === '0') {
    throw new AssemblyError('Runtime user must not be root');
  }
  if (runtime.uid !== undefined && runtime.uid <= 0) {
    throw new AssemblyError(`Runtime uid must be positive, got ${runtime.uid}`);
  }
}

/** CMD must exec the artifact itself; no shell wrapper. */
export function assertDirectEntry(runtime: Pick<RuntimeSpec, 'command' | 'home' | 'artifact_name'>): void {
  const allowed = directEntryPaths(runtime.home, runtime.artifact_name);
  const entry = runtime.command[0];
  if (entry === undefined || !allowed.includes(entry)) {
    throw new AssemblyError(
      `Entry command must invoke the artifact directly (${allowed.join(' or ')}), got ${JSON.stringify(runtime.command)}`,
    );
  }
}

export function planAssembly(
  artifact: Pick<Artifact, 'name' | 'dependencies'>,
  runtime: RuntimeSpec,
): AssemblyPlan {
  return {
    base: runtime.base,
    user: runtime.user,
    ...(runtime.uid !== undefined ? { uid: runtime.uid } : {}),
    home: runtime.home,
    artifact: { source: 'artifact', dest: posix.join(runtime.home, artifact.name) },
    libraries: artifact.dependencies.map((dep) => ({
      source: `lib/${dep.soname}`,
      dest: dep.runtime_path,
    })),
    command: runtime.command,
  };
}

async function findMissingDirectories(
  base: string,
  dirs: string[],
  ctx: StageContext,
): Promise<string[]> {
  if (dirs.length === 0) return [];
  let result: CommandResult;
  try {
    result = await ctx.docker.runInImage(base, ['-c', MISSING_DIRS_SCRIPT, 'sh', ...dirs], {
      entrypoint: '/bin/sh',
      network: 'none',
    });
  } catch (err) {
    throw new AssemblyError(`Could not inspect base filesystem: ${errorMessage(err)}`);
  }
  if (result.code !== 0) {
    throw new AssemblyError(`Could not inspect base filesystem of ${base}`, tail(result.stderr));
  }
  return result.stdout
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
}

function stageContext(artifact: Artifact, ctx: StageContext): string {
  const contextDir = join(ctx.scratchDir, 'assembly');
  mkdirSync(join(contextDir, 'lib'), { recursive: true });

  const copies = [
    { from: artifact.host_path, to: join(contextDir, 'artifact') },
    ...artifact.dependencies.map((dep) => ({
      from: dep.host_path,
      to: join(contextDir, 'lib', dep.soname),
    })),
  ];
  for (const { from, to } of copies) {
    if (!existsSync(from)) {
      throw new AssemblyError(`Missing file for assembly: ${from}`);
    }
    copyFileSync(from, to);
  }
  return contextDir;
}

/**
 * Builds the runtime image from the artifact and its resolved libraries only.
 * Nothing from the build environment is reachable from here.
 */
export async function runAssemblyStage(
  artifact: Artifact,
  runtime: RuntimeSpec,
  ctx: StageContext,
): Promise<RuntimeImage> {
  assertUnprivileged(runtime);
  assertDirectEntry(runtime);

  const plan = planAssembly(artifact, runtime);
  const owner = `${runtime.user}:${runtime.user}`;
  const files: ImageFile[] = [
    { path: plan.artifact.dest, owner, source: 'artifact' },
    ...plan.libraries.map((lib): ImageFile => ({ path: lib.dest, owner: 'root:root', source: 'library' })),
  ];

  const forbidden = files.filter((f) => isBuildOnlyFile(f.path)).map((f) => f.path);
  if (forbidden.length > 0) {
    throw new AssemblyError(`Build-only files may not be copied into the runtime image: ${forbidden.join(', ')}`);
  }

  // The home directory is created by useradd; its parent and every library
  // destination must already exist in the base.
  const requiredDirs = Array.from(
    new Set([posix.dirname(runtime.home), ...plan.libraries.map((lib) => posix.dirname(lib.dest))]),
  ).sort();
  const missing = await findMissingDirectories(runtime.base, requiredDirs, ctx);
  if (missing.length > 0) {
    throw new AssemblyError(`Copy destinations missing from ${runtime.base}: ${missing.join(', ')}`);
  }

  const contextDir = stageContext(artifact, ctx);
  const tag = runtimeImageTag(ctx.runId);
  const dockerfile = renderRuntimeDockerfile(plan);

  ctx.log.info('Assembling runtime image', { base: runtime.base, tag, files: files.length });

  let built: CommandResult;
  try {
    built = await ctx.docker.build({ dockerfile, context: contextDir, tag });
  } catch (err) {
    throw new AssemblyError(`Failed to start docker build: ${errorMessage(err)}`);
  }
  if (built.code !== 0) {
    throw new AssemblyError(
      `Runtime image build failed with exit code ${built.code}`,
      tail(built.stderr || built.stdout),
    );
  }

  const info = await ctx.docker.inspectImage(tag);
  if (!info) {
    throw new AssemblyError(`Assembled image ${tag} not found`);
  }
  if (info.user !== runtime.user) {
    throw new AssemblyError(
      `Assembled image runs as "${info.user || 'root'}", expected "${runtime.user}"`,
    );
  }
  if (JSON.stringify(info.cmd) !== JSON.stringify(runtime.command)) {
    throw new AssemblyError(`Assembled image command ${JSON.stringify(info.cmd)} does not match recipe`);
  }

  if (runtime.smoke) {
    const smoke = await runSmoke(ctx.docker, tag, runtime.smoke);
    if (smoke.missingLibraries.length > 0) {
      throw new AssemblyError(
        `Smoke test failed to load shared libraries: ${smoke.missingLibraries.join(', ')}`,
        tail(smoke.stderr),
      );
    }
    if (smoke.code !== 0) {
      throw new AssemblyError(`Smoke test exited with code ${smoke.code}`, tail(smoke.stderr || smoke.stdout));
    }
    ctx.log.info('Smoke test passed', { command: runtime.smoke });
  }

  return {
    ref: tag,
    base: runtime.base,
    files,
    user: runtime.user,
    home: runtime.home,
    workdir: runtime.home,
    command: runtime.command,
    slimmed: false,
    ...(info.size !== null ? { size: info.size } : {}),
  };
}
