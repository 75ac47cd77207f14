import type { DockerClient } from './docker.js';

export interface SmokeResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Sonames the dynamic loader could not find. */
  missingLibraries: string[];
}

const LOAD_ERROR = /error while loading shared libraries: ([^:\s]+)/g;

export function findMissingLibraries(stderr: string): string[] {
  return Array.from(stderr.matchAll(LOAD_ERROR), (m) => m[1] ?? '').filter(Boolean);
}

/**
 * Runs the smoke command in place of the image's CMD, as the image's own
 * user, without network.
 */
export async function runSmoke(
  docker: DockerClient,
  image: string,
  command: string[],
  timeoutMs = 60_000,
): Promise<SmokeResult> {
  const result = await docker.runInImage(image, command, { network: 'none', timeoutMs });
  return {
    ...result,
    missingLibraries: findMissingLibraries(result.stderr),
  };
}

export function sameBehavior(a: SmokeResult, b: SmokeResult): boolean {
  return a.code === b.code && a.stdout === b.stdout;
}
