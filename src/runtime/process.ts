import { spawn, type ChildProcessWithoutNullStreams, type SpawnOptionsWithoutStdio } from 'node:child_process';

export interface CommandOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  /** The child is killed with SIGKILL once this elapses. */
  timeoutMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Seam between the pipeline and external CLIs (docker, the slimming tool, git).
 * Rejects only when the process cannot be started.
 */
export interface CommandRunner {
  run(bin: string, args: string[], opts?: CommandOptions): Promise<CommandResult>;
}

export interface ProcessRunnerOptions {
  spawn?: typeof spawn;
  /** Bytes kept per stream; older output is dropped. Defaults to 4 MiB. */
  maxOutputBytes?: number;
}

const DEFAULT_MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

/** Keeps the most recent `limit` bytes written to it. */
class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    if (this.size > this.limit * 2) {
      const kept = this.contents();
      this.chunks = [kept];
      this.size = kept.length;
    }
  }

  contents(): Buffer {
    const all = Buffer.concat(this.chunks);
    return all.length > this.limit ? all.subarray(all.length - this.limit) : all;
  }
}

export class ProcessRunner implements CommandRunner {
  private readonly spawnImpl: typeof spawn;
  private readonly maxOutputBytes: number;

  constructor(opts: ProcessRunnerOptions = {}) {
    this.spawnImpl = opts.spawn ?? spawn;
    this.maxOutputBytes = opts.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  }

  run(bin: string, args: string[], opts: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const spawnOpts: SpawnOptionsWithoutStdio = {
        stdio: 'pipe',
        cwd: opts.cwd,
        env: opts.env ?? process.env,
      };
      const child: ChildProcessWithoutNullStreams = this.spawnImpl(bin, args, spawnOpts);

      const stdout = new OutputBuffer(this.maxOutputBytes);
      const stderr = new OutputBuffer(this.maxOutputBytes);
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (opts.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, opts.timeoutMs);
      }

      child.stdout.on('data', (chunk) => stdout.push(Buffer.from(chunk)));
      child.stderr.on('data', (chunk) => stderr.push(Buffer.from(chunk)));

      child.on('error', (err) => {
        if (timer) clearTimeout(timer);
        reject(err);
      });

      child.on('close', (code) => {
        if (timer) clearTimeout(timer);
        resolve({
          code,
          stdout: stdout.contents().toString('utf8'),
          stderr: stderr.contents().toString('utf8'),
          timedOut,
        });
      });

      try {
        if (opts.input !== undefined) child.stdin.write(opts.input);
        child.stdin.end();
      } catch (err) {
        child.kill();
        reject(err);
      }
    });
  }
}

/** Last `lines` lines of command output, for error details. */
export function tail(output: string, lines = 20): string {
  return output.trimEnd().split('\n').slice(-lines).join('\n');
}
