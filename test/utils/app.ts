import { Express } from 'express';
import { vi, type Mock } from 'vitest';
import { createServer } from '../../src/api/server.js';
import { ChallengesRepository } from '../../src/db/repositories/challenges.repository.js';
import { NotificationsRepository } from '../../src/db/repositories/notifications.repository.js';
import { ParticipationsRepository } from '../../src/db/repositories/participations.repository.js';
import {
  Challenge,
  NewChallenge,
  Notification,
  Participation,
} from '../../src/db/types/participation.types.js';
import { ChallengesHandler } from '../../src/handlers/challenges.handler.js';
import { NotificationsHandler } from '../../src/handlers/notifications.handler.js';
import { ParticipationsHandler } from '../../src/handlers/participations.handler.js';
import { ParticipationAcceptanceService } from '../../src/services/participation/acceptance.service.js';
import { ParticipationEnrollmentService } from '../../src/services/participation/enrollment.service.js';
import {
  FakeTx,
  InMemoryAcceptanceStore,
  InMemoryChallenges,
  InMemoryDb,
  InMemoryParticipations,
  InMemoryUnitOfWork,
  NOW,
  buildChallenge,
} from './fakes.js';

type ChallengesStore = Pick<ChallengesRepository, 'findAll' | 'findById' | 'create' | 'delete'>;

class InMemoryChallengesStore implements ChallengesStore {
  private nextId = 100;

  constructor(private readonly db: InMemoryDb) {}

  async findAll(): Promise<Challenge[]> {
    return [...this.db.challenges];
  }

  async findById(id: number): Promise<Challenge | null> {
    return this.db.challenges.find((c) => c.id === id) ?? null;
  }

  async create(data: NewChallenge): Promise<Challenge> {
    const challenge = buildChallenge({ ...data, id: this.nextId++ });
    this.db.challenges.push(challenge);
    return challenge;
  }

  async delete(id: number): Promise<boolean> {
    const before = this.db.challenges.length;
    this.db.challenges = this.db.challenges.filter((c) => c.id !== id);
    return this.db.challenges.length < before;
  }
}

class InMemoryParticipationReads
  implements Pick<ParticipationsRepository, 'findById' | 'findByChallenge'>
{
  constructor(private readonly db: InMemoryDb) {}

  async findById(id: number): Promise<Participation | null> {
    return this.db.participations.find((p) => p.id === id) ?? null;
  }

  async findByChallenge(challengeId: number): Promise<Participation[]> {
    return this.db.participations.filter((p) => p.challenge_id === challengeId);
  }
}

export interface TestApp {
  app: Express;
  db: InMemoryDb;
  notifications: Notification[];
  recompute: Mock<(challengeId: number) => Promise<void>>;
  notify: Mock<(participation: Participation) => Promise<void>>;
}

/**
 * Express app wired to in-memory stores
 */
export function createTestApp(): TestApp {
  const db = new InMemoryDb();
  const notifications: Notification[] = [];
  const unitOfWork = new InMemoryUnitOfWork(db);
  const recompute = vi.fn<(challengeId: number) => Promise<void>>().mockResolvedValue(undefined);
  const notify = vi
    .fn<(participation: Participation) => Promise<void>>()
    .mockResolvedValue(undefined);

  const acceptanceService = new ParticipationAcceptanceService<FakeTx>(
    new InMemoryAcceptanceStore(db),
    unitOfWork,
    { recompute }
  );
  const enrollmentService = new ParticipationEnrollmentService<FakeTx>({
    challenges: new InMemoryChallenges(db),
    participations: new InMemoryParticipations(db),
    acceptor: acceptanceService,
    unitOfWork,
    statusRecomputer: { recompute },
    notifier: { notify },
    now: () => NOW,
  });

  const notificationReads: Pick<NotificationsRepository, 'findByRecipient'> = {
    findByRecipient: async (recipientId) =>
      notifications.filter((n) => n.recipient_id === recipientId),
  };

  const challengesStore = new InMemoryChallengesStore(db);
  const app = createServer({
    challengesHandler: new ChallengesHandler(challengesStore),
    participationsHandler: new ParticipationsHandler(
      enrollmentService,
      acceptanceService,
      new InMemoryParticipationReads(db),
      challengesStore
    ),
    notificationsHandler: new NotificationsHandler(notificationReads),
  });

  return { app, db, notifications, recompute, notify };
}
