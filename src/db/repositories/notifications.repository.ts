import { PostgresAdapter } from '../adapters/PostgresAdapter.js';
import { Notification } from '../types/participation.types.js';

export class NotificationsRepository {
  constructor(private readonly db: PostgresAdapter) {}

  /**
   * Returns null when this participation was already notified
   */
  async createPendingParticipation(data: {
    recipientId: number;
    challengeId: number;
    participationId: number;
  }): Promise<Notification | null> {
    const [notification] = await this.db
      .getKnex()('notifications')
      .insert({
        recipient_id: data.recipientId,
        kind: 'pending_participation',
        challenge_id: data.challengeId,
        participation_id: data.participationId,
      })
      .onConflict(['kind', 'participation_id'])
      .ignore()
      .returning('*');

    return notification || null;
  }

  async findByRecipient(recipientId: number, limit = 50): Promise<Notification[]> {
    return this.db
      .getKnex()('notifications')
      .where('recipient_id', recipientId)
      .orderBy('created_at', 'desc')
      .limit(limit);
  }
}
