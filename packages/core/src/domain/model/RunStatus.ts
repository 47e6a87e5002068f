/**
 * Finite state machine for a validate → transform → load run.
 *
 * Valid transitions:
 * - `CREATED` → `VALIDATING` | `FAILED`
 * - `VALIDATING` → `TRANSFORMING` | `FAILED`
 * - `TRANSFORMING` → `LOADING` | `FAILED`
 * - `LOADING` → `SUCCESS` | `PARTIAL` | `FAILED`
 * - `SUCCESS`, `PARTIAL`, `FAILED` → (terminal)
 */
export const RunStatus = {
  CREATED: 'CREATED',
  VALIDATING: 'VALIDATING',
  TRANSFORMING: 'TRANSFORMING',
  LOADING: 'LOADING',
  SUCCESS: 'SUCCESS',
  PARTIAL: 'PARTIAL',
  FAILED: 'FAILED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

/** Terminal outcome of a run as reported to users and the run log. */
export type RunOutcome = typeof RunStatus.SUCCESS | typeof RunStatus.PARTIAL | typeof RunStatus.FAILED;

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.CREATED]: [RunStatus.VALIDATING, RunStatus.FAILED],
  [RunStatus.VALIDATING]: [RunStatus.TRANSFORMING, RunStatus.FAILED],
  [RunStatus.TRANSFORMING]: [RunStatus.LOADING, RunStatus.FAILED],
  [RunStatus.LOADING]: [RunStatus.SUCCESS, RunStatus.PARTIAL, RunStatus.FAILED],
  [RunStatus.SUCCESS]: [],
  [RunStatus.PARTIAL]: [],
  [RunStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the run lifecycle FSM. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: RunStatus): status is RunOutcome {
  return VALID_TRANSITIONS[status].length === 0;
}
