import type { PipelineState, StateTransition } from './types.js';

const TRANSITIONS: Record<PipelineState, ReadonlyArray<PipelineState>> = {
  pending: ['building', 'failed'],
  building: ['assembling', 'failed'],
  assembling: ['slimming', 'publishing', 'failed'],
  slimming: ['publishing', 'failed'],
  publishing: ['done', 'failed'],
  done: [],
  failed: [],
};

export function isTerminal(state: PipelineState): boolean {
  return state === 'done' || state === 'failed';
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Linear run lifecycle. Any illegal move throws; terminal states accept none.
 */
export class PipelineStateMachine {
  private current: PipelineState = 'pending';
  private readonly history: StateTransition[] = [];

  get state(): PipelineState {
    return this.current;
  }

  get transitions(): StateTransition[] {
    return [...this.history];
  }

  transition(to: PipelineState, detail?: string): StateTransition {
    if (!canTransition(this.current, to)) {
      throw new Error(`Illegal pipeline transition: ${this.current} -> ${to}`);
    }
    const transition: StateTransition = {
      from: this.current,
      to,
      at: new Date().toISOString(),
      ...(detail !== undefined ? { detail } : {}),
    };
    this.current = to;
    this.history.push(transition);
    return transition;
  }
}
