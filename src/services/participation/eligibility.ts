import { Challenge } from '../../db/types/participation.types.js';

/** Unsponsored challenges stop taking participants at this many active participations */
export const UNSPONSORED_PARTICIPANT_CAP = 2;

export type JoiningBlockedReason = 'capacity' | 'deadline';

type EligibilityFields = Pick<
  Challenge,
  'participations_count' | 'sponsored' | 'submission_ends_at'
>;

export function isAtCapacity(
  challenge: Pick<Challenge, 'sponsored'>,
  activeParticipations: number
): boolean {
  return activeParticipations >= UNSPONSORED_PARTICIPANT_CAP && !challenge.sponsored;
}

export function hasDeadlinePassed(
  challenge: Pick<Challenge, 'submission_ends_at'>,
  now: Date
): boolean {
  if (challenge.submission_ends_at === null) return false;
  return new Date(challenge.submission_ends_at).getTime() < now.getTime();
}

/**
 * Returns why a challenge refuses new participants, or null when joining is allowed.
 * The capacity check comes first; sponsored challenges never hit it.
 */
export function joiningBlockedReason(
  challenge: EligibilityFields,
  now: Date
): JoiningBlockedReason | null {
  if (isAtCapacity(challenge, challenge.participations_count)) {
    return 'capacity';
  }
  if (hasDeadlinePassed(challenge, now)) {
    return 'deadline';
  }
  return null;
}
