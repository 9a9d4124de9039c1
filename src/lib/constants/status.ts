/**
 * Challenge Record State Constants
 *
 * Lifecycle of one TXT record, owned by the challenge record manager:
 *
 * pending -> created -> propagation-wait -> active -> removed
 *    |-> failed (from any non-terminal state; a committed record still moves on to removed)
 */
export const CHALLENGE_STATE = {
  /** perform() accepted the challenge, nothing written yet */
  PENDING: 'pending' as const,
  /** The provider committed the TXT record */
  CREATED: 'created' as const,
  /** Waiting for the provider API to list the new record */
  PROPAGATION_WAIT: 'propagation-wait' as const,
  /** perform() returned; the host may ask the CA to validate */
  ACTIVE: 'active' as const,
  /** cleanup() removed the record (or found it gone) */
  REMOVED: 'removed' as const,
  /** Unrecoverable provider error */
  FAILED: 'failed' as const,
} as const;

export type ChallengeState = (typeof CHALLENGE_STATE)[keyof typeof CHALLENGE_STATE];

const TRANSITIONS: Record<ChallengeState, readonly ChallengeState[]> = {
  [CHALLENGE_STATE.PENDING]: [CHALLENGE_STATE.CREATED, CHALLENGE_STATE.FAILED],
  [CHALLENGE_STATE.CREATED]: [
    CHALLENGE_STATE.PROPAGATION_WAIT,
    CHALLENGE_STATE.REMOVED,
    CHALLENGE_STATE.FAILED,
  ],
  [CHALLENGE_STATE.PROPAGATION_WAIT]: [
    CHALLENGE_STATE.ACTIVE,
    CHALLENGE_STATE.REMOVED,
    CHALLENGE_STATE.FAILED,
  ],
  [CHALLENGE_STATE.ACTIVE]: [CHALLENGE_STATE.REMOVED, CHALLENGE_STATE.FAILED],
  [CHALLENGE_STATE.REMOVED]: [],
  // A committed record that later failed is still retracted by cleanup
  [CHALLENGE_STATE.FAILED]: [CHALLENGE_STATE.REMOVED],
};

export function canTransition(from: ChallengeState, to: ChallengeState): boolean {
  return TRANSITIONS[from].includes(to);
}
