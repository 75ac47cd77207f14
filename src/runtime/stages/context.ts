import type { Logger } from '../../shared/logger.js';
import type { DockerClient } from '../docker.js';
import type { CommandRunner } from '../process.js';

/** What a stage may touch: its own run's scratch dir and the external CLIs. */
export interface StageContext {
  runId: string;
  scratchDir: string;
  docker: DockerClient;
  runner: CommandRunner;
  log: Logger;
}
