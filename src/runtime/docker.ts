import { z } from 'zod';
import { errorMessage } from '../shared/errors.js';
import type { CommandResult, CommandRunner } from './process.js';

const ImageInspectSchema = z.object({
  Id: z.string(),
  Size: z.number().optional(),
  Config: z
    .object({
      User: z.string().nullish(),
      Cmd: z.array(z.string()).nullish(),
      Entrypoint: z.array(z.string()).nullish(),
      WorkingDir: z.string().nullish(),
    })
    .nullish(),
});

export interface ImageInfo {
  id: string;
  size: number | null;
  user: string;
  cmd: string[];
  entrypoint: string[];
  workdir: string;
}

export interface BuildImageOptions {
  dockerfile: string;
  context: string;
  tag: string;
  target?: string;
}

export interface RunInImageOptions {
  entrypoint?: string;
  network?: string;
  timeoutMs?: number;
}

/**
 * Thin wrapper over the docker CLI. Every method returns the raw command
 * result; callers decide which error a failure maps to.
 */
export class DockerClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly dockerBin = 'docker',
  ) {}

  exec(args: string[], input?: string, timeoutMs?: number): Promise<CommandResult> {
    return this.runner.run(this.dockerBin, args, { input, timeoutMs });
  }

  build(opts: BuildImageOptions): Promise<CommandResult> {
    const args = ['build', '-f', '-', '-t', opts.tag];
    if (opts.target) args.push('--target', opts.target);
    args.push(opts.context);
    return this.exec(args, opts.dockerfile);
  }

  createContainer(image: string, name: string): Promise<CommandResult> {
    return this.exec(['create', '--name', name, image]);
  }

  /** Copies out of a container, following symlinks so the real file lands on the host. */
  copyFromContainer(container: string, src: string, dest: string): Promise<CommandResult> {
    return this.exec(['cp', '-L', `${container}:${src}`, dest]);
  }

  removeContainer(name: string): Promise<CommandResult> {
    return this.exec(['rm', '-f', name]);
  }

  removeImage(ref: string): Promise<CommandResult> {
    return this.exec(['rmi', '-f', ref]);
  }

  runInImage(image: string, command: string[], opts: RunInImageOptions = {}): Promise<CommandResult> {
    const args = ['run', '--rm'];
    if (opts.network) args.push('--network', opts.network);
    if (opts.entrypoint !== undefined) args.push('--entrypoint', opts.entrypoint);
    args.push(image, ...command);
    return this.exec(args, undefined, opts.timeoutMs);
  }

  async inspectImage(ref: string): Promise<ImageInfo | null> {
    const result = await this.exec(['image', 'inspect', ref]);
    if (result.code !== 0) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch (err) {
      throw new Error(`docker image inspect returned invalid JSON: ${errorMessage(err)}`);
    }
    const parsed = z.array(ImageInspectSchema).min(1).parse(raw);
    const image = parsed[0];
    if (!image) return null;
    return {
      id: image.Id,
      size: image.Size ?? null,
      user: image.Config?.User ?? '',
      cmd: image.Config?.Cmd ?? [],
      entrypoint: image.Config?.Entrypoint ?? [],
      workdir: image.Config?.WorkingDir ?? '',
    };
  }

  tag(source: string, target: string): Promise<CommandResult> {
    return this.exec(['tag', source, target]);
  }

  push(ref: string): Promise<CommandResult> {
    return this.exec(['push', ref]);
  }

  /** The token travels on stdin, never in argv. */
  login(registry: string, username: string, token: string): Promise<CommandResult> {
    return this.exec(['login', registry, '--username', username, '--password-stdin'], token);
  }

  logout(registry: string): Promise<CommandResult> {
    return this.exec(['logout', registry]);
  }
}
