import { logger } from '../observability/logger';
import { stateTransitions } from '../observability/metrics';

export interface StateTransitionEvent<S extends string> {
  machine: string;
  subjectId: number;
  from: S;
  to: S;
  reason: string;
  timestamp: number;
}

/**
 * Fixed-table state machine. Transitions outside the table are refused and
 * leave the state where it was.
 */
export class StateMachine<S extends string> {
  constructor(
    readonly name: string,
    private readonly transitions: Readonly<Record<S, readonly S[]>>,
  ) {}

  canTransition(from: S, to: S): boolean {
    return from === to || this.transitions[from].includes(to);
  }

  /**
   * Attempt a state transition. Returns the new state if valid, or the current state if not.
   */
  transition(
    subjectId: number,
    currentState: S,
    targetState: S,
    reason: string,
  ): { newState: S; event: StateTransitionEvent<S> | null } {
    if (currentState === targetState) {
      return { newState: currentState, event: null };
    }

    if (!this.transitions[currentState].includes(targetState)) {
      logger.warn(
        { machine: this.name, subjectId, from: currentState, to: targetState, reason },
        'Invalid state transition attempted',
      );
      return { newState: currentState, event: null };
    }

    const event: StateTransitionEvent<S> = {
      machine: this.name,
      subjectId,
      from: currentState,
      to: targetState,
      reason,
      timestamp: Date.now(),
    };

    stateTransitions.inc({ machine: this.name, from: currentState, to: targetState });
    logger.info(event, 'State transition');

    return { newState: targetState, event };
  }
}
