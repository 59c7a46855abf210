import { IterationStateError } from '../../domain/errors/CouncilErrors';

export enum IterationState {
  IDLE = 'idle',
  PROPOSING = 'proposing',
  CRITIQUING = 'critiquing',
  ARBITRATING = 'arbitrating',
  AWAITING_OUTCOME = 'awaiting_outcome',
  LEARNING = 'learning'
}

const TRANSITIONS: Record<IterationState, ReadonlyArray<IterationState>> = {
  [IterationState.IDLE]: [IterationState.PROPOSING, IterationState.AWAITING_OUTCOME],
  [IterationState.PROPOSING]: [IterationState.CRITIQUING, IterationState.IDLE],
  [IterationState.CRITIQUING]: [IterationState.ARBITRATING, IterationState.IDLE],
  [IterationState.ARBITRATING]: [IterationState.AWAITING_OUTCOME, IterationState.IDLE],
  [IterationState.AWAITING_OUTCOME]: [IterationState.LEARNING, IterationState.IDLE],
  // back to AWAITING_OUTCOME when the commit fails and the outcome has to be resubmitted
  [IterationState.LEARNING]: [IterationState.IDLE, IterationState.AWAITING_OUTCOME]
};

export function canTransition(from: IterationState, to: IterationState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Tracks where the council is in its proposal → critique → arbitration → learning cycle
 * and rejects any move the cycle does not allow.
 */
export class IterationStateMachine {
  private current: IterationState = IterationState.IDLE;

  constructor(private onChange?: (from: IterationState, to: IterationState) => void) {}

  get state(): IterationState {
    return this.current;
  }

  transition(to: IterationState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new IterationStateError(`Cannot move from ${from} to ${to}`, { from, to });
    }
    this.current = to;
    if (this.onChange) {
      this.onChange(from, to);
    }
  }

  is(state: IterationState): boolean {
    return this.current === state;
  }
}
