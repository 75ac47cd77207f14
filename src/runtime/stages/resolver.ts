import { mkdirSync } from 'node:fs';
import { basename, join } from 'node:path';
import type { RuntimeSpec } from '../../recipe/types.js';
import { UnresolvedDependencyError, errorMessage } from '../../shared/errors.js';
import { tail, type CommandResult } from '../process.js';
import type { Artifact, ResolvedDependency } from '../types.js';
import type { BuildEnvironment } from './build.js';
import type { StageContext } from './context.js';

export interface LddEntry {
  soname: string;
  /** Resolved path in the build environment; null when ldd reports "not found". */
  path: string | null;
}

export interface LddReport {
  static: boolean;
  entries: LddEntry[];
}

export interface DependencyPlan {
  copy: Array<{ soname: string; path: string }>;
  provided: string[];
  unresolved: string[];
}

const VDSO = /^linux-(vdso|gate)\.so/;
const SONAME = /\.so(\.[0-9]+)*$/;
const STATIC_MARKERS = ['not a dynamic executable', 'statically linked'];

/**
 * Parse `ldd` output. Handles the three line shapes ldd emits:
 *   libz.so.1 => /lib/x86_64-linux-gnu/libz.so.1 (0x...)
 *   libfoo.so.2 => not found
 *   /lib64/ld-linux-x86-64.so.2 (0x...)
 */
export function parseLddOutput(output: string): LddReport {
  if (STATIC_MARKERS.some((marker) => output.includes(marker))) {
    return { static: true, entries: [] };
  }

  const entries: LddEntry[] = [];
  const seen = new Set<string>();
  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    let entry: LddEntry | null = null;
    const arrow = /^(\S+)\s+=>\s+(.*)$/.exec(line);
    if (arrow) {
      const soname = arrow[1] ?? '';
      const target = (arrow[2] ?? '').trim();
      if (target.startsWith('not found')) {
        entry = { soname, path: null };
      } else {
        const path = target.split(/\s+/)[0] ?? '';
        entry = { soname, path: path.startsWith('/') ? path : null };
      }
    } else {
      const first = line.split(/\s+/)[0] ?? '';
      if (first.startsWith('/')) {
        entry = { soname: basename(first), path: first };
      } else if (SONAME.test(first)) {
        entry = { soname: first, path: null };
      }
    }

    if (!entry || VDSO.test(entry.soname) || seen.has(entry.soname)) continue;
    seen.add(entry.soname);
    entries.push(entry);
  }
  return { static: false, entries };
}

/**
 * Sonames listed by `ldconfig -p`, e.g.
 *   libz.so.1 (libc6,x86-64) => /lib/x86_64-linux-gnu/libz.so.1
 */
export function parseLdconfigOutput(output: string): Set<string> {
  const sonames = new Set<string>();
  for (const rawLine of output.split('\n')) {
    const match = /^\s*(\S+)\s+\([^)]*\)\s+=>\s+(\S+)/.exec(rawLine);
    if (!match) continue;
    sonames.add(match[1] ?? '');
    const path = match[2] ?? '';
    sonames.add(basename(path));
  }
  sonames.delete('');
  return sonames;
}

/**
 * Split the artifact's libraries into those the base already provides (never
 * copied, so the base's C runtime stays authoritative), those to copy from the
 * build environment, and those found in neither.
 */
export function planDependencies(entries: LddEntry[], baseProvided: ReadonlySet<string>): DependencyPlan {
  const plan: DependencyPlan = { copy: [], provided: [], unresolved: [] };
  for (const entry of entries) {
    const fileName = entry.path ? basename(entry.path) : entry.soname;
    if (baseProvided.has(entry.soname) || baseProvided.has(fileName)) {
      plan.provided.push(entry.soname);
    } else if (entry.path) {
      plan.copy.push({ soname: entry.soname, path: entry.path });
    } else {
      plan.unresolved.push(entry.soname);
    }
  }
  return plan;
}

async function listBaseLibraries(runtime: RuntimeSpec, ctx: StageContext): Promise<Set<string>> {
  const provided = new Set(runtime.base_provides);
  let result: CommandResult;
  try {
    result = await ctx.docker.runInImage(runtime.base, ['-p'], { entrypoint: 'ldconfig', network: 'none' });
  } catch (err) {
    ctx.log.warn('Could not list base libraries; using base_provides only', { error: errorMessage(err) });
    return provided;
  }
  if (result.code !== 0) {
    ctx.log.warn('ldconfig unavailable in base; using base_provides only', {
      base: runtime.base,
      stderr: tail(result.stderr, 3),
    });
    return provided;
  }
  for (const soname of parseLdconfigOutput(result.stdout)) provided.add(soname);
  return provided;
}

export async function resolveDependencies(
  artifact: Artifact,
  runtime: RuntimeSpec,
  env: BuildEnvironment,
  ctx: StageContext,
): Promise<ResolvedDependency[]> {
  let ldd: CommandResult;
  try {
    ldd = await ctx.docker.runInImage(env.image, ['ldd', artifact.build_path], { network: 'none' });
  } catch (err) {
    throw new UnresolvedDependencyError([], `Could not run ldd: ${errorMessage(err)}`);
  }

  const report = parseLddOutput(`${ldd.stdout}\n${ldd.stderr}`);
  if (report.static) {
    ctx.log.info('Artifact is statically linked; no libraries to copy', { artifact: artifact.name });
    return [];
  }
  if (ldd.code !== 0) {
    throw new UnresolvedDependencyError(
      [],
      `ldd failed on ${artifact.build_path} with exit code ${ldd.code}`,
      tail(ldd.stderr || ldd.stdout),
    );
  }

  const baseProvided = await listBaseLibraries(runtime, ctx);
  const plan = planDependencies(report.entries, baseProvided);
  if (plan.unresolved.length > 0) {
    throw new UnresolvedDependencyError(plan.unresolved);
  }

  ctx.log.info('Dependencies resolved', {
    copy: plan.copy.map((d) => d.soname),
    provided_by_base: plan.provided,
  });

  const libDir = join(ctx.scratchDir, 'lib');
  mkdirSync(libDir, { recursive: true });

  const resolved: ResolvedDependency[] = [];
  for (const dep of plan.copy) {
    const hostPath = join(libDir, dep.soname);
    const copied = await ctx.docker.copyFromContainer(env.container, dep.path, hostPath);
    if (copied.code !== 0) {
      throw new UnresolvedDependencyError(
        [dep.soname],
        `Could not extract ${dep.path} from the build environment`,
        tail(copied.stderr),
      );
    }
    resolved.push({
      soname: dep.soname,
      build_path: dep.path,
      host_path: hostPath,
      runtime_path: dep.path,
    });
  }
  return resolved;
}
