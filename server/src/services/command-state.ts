import { CommandState } from '@satsim/shared';
import type { CommandRecord } from './simulator-store.js';

// ─── Lifecycle Graph ─────────────────────────────────────────────────────────

/**
 * QUEUED → ACKED → CAPTURING → DOWNLINK_READY, with FAILED reachable from
 * every non-terminal state. FAILED → QUEUED is the operator rerun; QUEUED →
 * QUEUED is the pipeline re-stamping the queue message on entry.
 */
const ALLOWED_TRANSITIONS: Record<CommandState, readonly CommandState[]> = {
  [CommandState.QUEUED]: [CommandState.QUEUED, CommandState.ACKED, CommandState.FAILED],
  [CommandState.ACKED]: [CommandState.CAPTURING, CommandState.FAILED],
  [CommandState.CAPTURING]: [CommandState.DOWNLINK_READY, CommandState.FAILED],
  [CommandState.DOWNLINK_READY]: [],
  [CommandState.FAILED]: [CommandState.QUEUED],
};

export const IN_PROGRESS_STATES: readonly CommandState[] = [
  CommandState.QUEUED,
  CommandState.ACKED,
  CommandState.CAPTURING,
];

export function isTerminal(state: CommandState): boolean {
  return state === CommandState.DOWNLINK_READY || state === CommandState.FAILED;
}

export function canTransition(from: CommandState, to: CommandState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Apply a state mutation. Must be called inside the store lock.
 * Throws on an edge the lifecycle graph does not contain.
 */
export function transitionCommand(
  command: CommandRecord,
  next: CommandState,
  message: string | null,
  now: Date = new Date(),
): void {
  if (!canTransition(command.state, next)) {
    throw new Error(`Illegal command transition ${command.state} → ${next} for ${command.id}`);
  }
  command.state = next;
  command.message = message;
  command.updatedAt = now;
  command.transitions.push({ state: next, message, at: now.toISOString() });
}
