import { InvalidTransitionError } from '@stress-bridge/utils';

export type InvocationState = 'idle' | 'translating' | 'provisioning' | 'running' | 'failed' | 'reporting' | 'done';

/** Valid state transitions for one stress invocation. */
export const INVOCATION_TRANSITIONS: Readonly<Record<InvocationState, readonly InvocationState[]>> = {
  idle: ['translating'],
  translating: ['provisioning'],
  provisioning: ['running', 'failed'],
  running: ['reporting', 'failed'],
  failed: ['reporting'],
  reporting: ['done'],
  done: [],
};

export class InvocationStateMachine {
  private current: InvocationState = 'idle';
  private readonly visited: InvocationState[] = ['idle'];

  get state(): InvocationState {
    return this.current;
  }

  /** Every state entered so far, in order, starting with `idle`. */
  get history(): readonly InvocationState[] {
    return [...this.visited];
  }

  canTransition(to: InvocationState): boolean {
    return INVOCATION_TRANSITIONS[this.current].includes(to);
  }

  transition(to: InvocationState): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.current = to;
    this.visited.push(to);
  }
}
