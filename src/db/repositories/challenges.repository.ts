import { PostgresAdapter } from '../adapters/PostgresAdapter.js';
import { Challenge, ChallengeStatus, NewChallenge } from '../types/participation.types.js';

export class ChallengesRepository {
  constructor(private readonly db: PostgresAdapter) {}

  async create(data: NewChallenge): Promise<Challenge> {
    const [challenge] = await this.db
      .getKnex()('challenges')
      .insert({
        ...data,
        participations_count: 0,
        status: 'open',
      })
      .returning('*');

    return challenge;
  }

  async findById(id: number): Promise<Challenge | null> {
    const result = await this.db.getKnex()('challenges').where('id', id).first();

    return result || null;
  }

  async findByInvitationToken(token: string): Promise<Challenge | null> {
    const result = await this.db.getKnex()('challenges').where('invitation_token', token).first();

    return result || null;
  }

  async findAll(): Promise<Challenge[]> {
    return this.db.getKnex()('challenges').orderBy('created_at', 'desc');
  }

  async updateAggregate(
    id: number,
    aggregate: { participations_count: number; status: ChallengeStatus }
  ): Promise<void> {
    await this.db
      .getKnex()('challenges')
      .where('id', id)
      .update({
        ...aggregate,
        updated_at: this.db.getKnex().fn.now(),
      });
  }

  async delete(id: number): Promise<boolean> {
    const deleted = await this.db.getKnex()('challenges').where('id', id).delete();

    return deleted > 0;
  }
}
