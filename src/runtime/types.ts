import type { PipelineErrorKind } from '../shared/errors.js';

export type PipelineState =
  | 'pending'
  | 'building'
  | 'assembling'
  | 'slimming'
  | 'publishing'
  | 'done'
  | 'failed';

export type TriggerKind = 'push' | 'manual';

export interface ResolvedDependency {
  soname: string;
  build_path: string;   // path inside the build environment
  host_path: string;    // extracted copy in the run's scratch dir
  runtime_path: string; // destination inside the runtime image
}

export interface Artifact {
  name: string;
  build_path: string;
  host_path: string;
  sha256: string;
  size: number;
  dependencies: ResolvedDependency[];
}

export interface ImageFile {
  path: string;
  owner: string; // "user:group"
  source: 'artifact' | 'library';
}

export interface RuntimeImage {
  ref: string;
  base: string;
  files: ImageFile[];
  user: string;
  home: string;
  workdir: string;
  command: string[];
  slimmed: boolean;
  size?: number;
}

export interface PublishTarget {
  registry: string;
  repository: string;
  tag: string;
  username_env: string;
  token_env: string;
}

/** Held only for the duration of the publish stage. */
export interface RegistryCredential {
  username: string;
  token: string;
}

export interface AssemblyPlan {
  base: string;
  user: string;
  uid?: number;
  home: string;
  artifact: { source: string; dest: string };
  libraries: Array<{ source: string; dest: string }>;
  command: string[];
}

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
  at: string;
  detail?: string;
}

export interface RunRecord {
  id: string;
  workspace_id: string;
  recipe: string;
  trigger: TriggerKind;
  state: PipelineState;
  error_kind: PipelineErrorKind | null;
  error: string | null;
  image_ref: string | null;
  slimmed: boolean;
  fell_back: boolean;
  dry_run: boolean;
  started_at: string;
  ended_at: string | null;
}

export interface RunResult {
  run_id: string;
  recipe: string;
  trigger: TriggerKind;
  state: 'done' | 'failed';
  error_kind?: PipelineErrorKind;
  error?: string;
  artifact?: Artifact;
  image?: RuntimeImage;
  image_ref?: string;
  slimmed: boolean;
  fell_back: boolean;
  transitions: StateTransition[];
  started_at: string;
  ended_at: string;
}
