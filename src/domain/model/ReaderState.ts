/**
 * Finite state machine for a reader scope.
 *
 * Valid transitions:
 * - `UNOPENED` → `OPEN` | `CLOSED`
 * - `OPEN` → `ITERATING` | `EXHAUSTED` | `CLOSED`
 * - `ITERATING` → `EXHAUSTED` | `CLOSED`
 * - `EXHAUSTED` → `CLOSED`
 * - `CLOSED` → (terminal)
 */
export const ReaderState = {
  UNOPENED: 'UNOPENED',
  OPEN: 'OPEN',
  ITERATING: 'ITERATING',
  EXHAUSTED: 'EXHAUSTED',
  CLOSED: 'CLOSED',
} as const;

export type ReaderState = (typeof ReaderState)[keyof typeof ReaderState];

const VALID_TRANSITIONS: Record<ReaderState, readonly ReaderState[]> = {
  [ReaderState.UNOPENED]: [ReaderState.OPEN, ReaderState.CLOSED],
  [ReaderState.OPEN]: [ReaderState.ITERATING, ReaderState.EXHAUSTED, ReaderState.CLOSED],
  [ReaderState.ITERATING]: [ReaderState.EXHAUSTED, ReaderState.CLOSED],
  [ReaderState.EXHAUSTED]: [ReaderState.CLOSED],
  [ReaderState.CLOSED]: [],
};

/** Check whether a state transition is valid according to the reader lifecycle FSM. */
export function canTransition(from: ReaderState, to: ReaderState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
