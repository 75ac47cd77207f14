export { loadRecipe, parseRecipe } from './recipe/load.js';
export { renderBuilderDockerfile, renderRuntimeDockerfile } from './recipe/dockerfile.js';
export { DEFAULT_RECIPE } from './recipe/defaults.js';
export type { Recipe, RecipeInput, BuildSpec, RuntimeSpec, SlimmingPolicy, PublishSpec, TriggerSpec } from './recipe/types.js';

export { runPipeline, type PipelineContext } from './runtime/runner.js';
export { planDispatch, type Dispatch, type DispatchOptions } from './runtime/dispatch.js';
export { evaluateTrigger, type TriggerEvent, type TriggerDecision } from './runtime/triggers.js';
export { PipelineStateMachine, canTransition, isTerminal } from './runtime/state.js';
export { ProcessRunner, type CommandRunner, type CommandOptions, type CommandResult } from './runtime/process.js';
export { DockerClient } from './runtime/docker.js';
export { runBuildStage } from './runtime/stages/build.js';
export { resolveDependencies, parseLddOutput, planDependencies } from './runtime/stages/resolver.js';
export { runAssemblyStage, planAssembly } from './runtime/stages/assembly.js';
export { runSlimmingStage } from './runtime/stages/slimming.js';
export { runPublishStage, publishRef } from './runtime/stages/publish.js';
export { resolveRepository, buildPublishTarget } from './runtime/repository.js';
export { runDoctorChecks, type DoctorReport } from './runtime/doctor.js';
export { getRun, listRuns } from './runtime/run-store.js';
export type * from './runtime/types.js';

export { initWorkspace } from './workspace/init.js';
export { verifyAuditChain, listRunEvents } from './audit/audit.js';
export { createServer, startServer } from './api/server.js';
export * from './shared/errors.js';
