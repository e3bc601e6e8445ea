/**
 * Job State Machine
 *
 * Strict state machine for conversion job lifecycle.
 *
 * State Flow:
 * PENDING → RUNNING → SUCCEEDED
 *     ↘         ↘ FAILED
 *      CANCELED ← ┘
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Terminal states have no exits; a retry is a new job
 */

import { StateTransitionError } from './errors/index.js';

export const JobState = {
  PENDING: 'PENDING',
  RUNNING: 'RUNNING',
  SUCCEEDED: 'SUCCEEDED',
  FAILED: 'FAILED',
  CANCELED: 'CANCELED',
} as const;

export type JobState = (typeof JobState)[keyof typeof JobState];

export type TerminalJobState = typeof JobState.SUCCEEDED | typeof JobState.FAILED | typeof JobState.CANCELED;

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, ReadonlySet<JobState>> = {
  PENDING: new Set<JobState>([
    'RUNNING',
    'CANCELED',
  ]),
  RUNNING: new Set<JobState>([
    'SUCCEEDED',
    'FAILED',
    'CANCELED',
  ]),
  SUCCEEDED: new Set<JobState>([]),
  FAILED: new Set<JobState>([]),
  CANCELED: new Set<JobState>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobState): JobState[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalState(state: JobState): state is TerminalJobState {
  return validTransitions[state].size === 0;
}

/**
 * Job State Machine class
 * Manages state transitions with validation
 */
export class JobStateMachine {
  private currentState: JobState;
  private history: JobStateTransition[];
  private readonly jobId: string;

  constructor(jobId: string, initialState: JobState = JobState.PENDING) {
    this.jobId = jobId;
    this.currentState = initialState;
    this.history = [];
  }

  getState(): JobState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: JobState, reason?: string): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }
}
