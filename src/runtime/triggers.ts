import type { TriggerSpec } from '../recipe/types.js';
import type { TriggerKind } from './types.js';

export type TriggerEvent =
  | { kind: 'push'; ref: string }
  | { kind: 'manual' };

export interface TriggerDecision {
  run: boolean;
  trigger: TriggerKind;
  reason: string;
}

const BRANCH_REF = /^refs\/heads\/(.+)$/;

/**
 * A push runs only for a configured branch; a manual dispatch runs when the
 * recipe allows it. Neither carries parameters beyond the recipe itself.
 */
export function evaluateTrigger(event: TriggerEvent, triggers: TriggerSpec): TriggerDecision {
  if (event.kind === 'manual') {
    return triggers.manual
      ? { run: true, trigger: 'manual', reason: 'manual dispatch' }
      : { run: false, trigger: 'manual', reason: 'manual dispatch is disabled for this recipe' };
  }

  const branch = BRANCH_REF.exec(event.ref)?.[1];
  if (!branch) {
    return { run: false, trigger: 'push', reason: `not a branch push: ${event.ref}` };
  }
  if (!triggers.push.branches.includes(branch)) {
    return { run: false, trigger: 'push', reason: `branch ${branch} is not a release branch` };
  }
  return { run: true, trigger: 'push', reason: `push to ${branch}` };
}
