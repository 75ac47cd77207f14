export type PipelineErrorKind =
  | 'compile'
  | 'unresolved_dependency'
  | 'assembly'
  | 'slimming'
  | 'auth'
  | 'push';

/**
 * Base class for every error that terminates a pipeline run.
 * The run records `kind` as its failure reason.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly detail?: string;

  constructor(message: string, detail?: string) {
    super(message);
    this.name = new.target.name;
    this.detail = detail;
  }
}

export class CompileError extends PipelineError {
  readonly kind = 'compile';
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, detail?: string) {
    super(message, detail);
    this.exitCode = exitCode;
  }
}

export class UnresolvedDependencyError extends PipelineError {
  readonly kind = 'unresolved_dependency';
  readonly sonames: string[];

  constructor(sonames: string[], message?: string, detail?: string) {
    super(message ?? `Unresolved shared libraries: ${sonames.join(', ')}`, detail);
    this.sonames = sonames;
  }
}

export class AssemblyError extends PipelineError {
  readonly kind = 'assembly';
}

export class SlimmingError extends PipelineError {
  readonly kind = 'slimming';
}

export class AuthError extends PipelineError {
  readonly kind = 'auth';
}

export class PushError extends PipelineError {
  readonly kind = 'push';
}

/** Invalid or incomplete recipe; raised before any run starts. */
export class RecipeError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'RecipeError';
    this.issues = issues;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
