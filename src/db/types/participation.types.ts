// Database Models

export const ACCEPTATION_STATUSES = ['pending', 'accepted', 'rejected'] as const;
export type AcceptationStatus = (typeof ACCEPTATION_STATUSES)[number];

export const CHALLENGE_STATUSES = ['open', 'full', 'closed'] as const;
export type ChallengeStatus = (typeof CHALLENGE_STATUSES)[number];

export interface Challenge {
  id: number;
  title: string;
  description: string;
  creator_id: number;
  open: boolean;
  sponsored: boolean;
  participations_count: number;
  submission_ends_at: Date | string | null;
  invitation_token: string;
  status: ChallengeStatus;
  created_at: Date | string;
  updated_at: Date | string;
}

export interface Participation {
  id: number;
  user_id: number;
  challenge_id: number;
  acceptation_status: AcceptationStatus;
  accepted_at: Date | string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

export type NotificationKind = 'pending_participation';

export interface Notification {
  id: number;
  recipient_id: number;
  kind: NotificationKind;
  challenge_id: number;
  participation_id: number;
  read_at: Date | string | null;
  created_at: Date | string;
}

export interface NewParticipation {
  user_id: number;
  challenge_id: number;
  acceptation_status: AcceptationStatus;
}

export interface NewChallenge {
  title: string;
  description: string;
  creator_id: number;
  open: boolean;
  sponsored: boolean;
  submission_ends_at: Date | null;
  invitation_token: string;
}

export function isAcceptationStatus(value: unknown): value is AcceptationStatus {
  return ACCEPTATION_STATUSES.some((status) => status === value);
}
