import { Knex } from 'knex';
import { PostgresAdapter } from '../adapters/PostgresAdapter.js';
import { NewParticipation, Participation } from '../types/participation.types.js';

export class ParticipationsRepository {
  constructor(private readonly db: PostgresAdapter) {}

  private query(trx?: Knex.Transaction): Knex.QueryBuilder {
    return (trx ?? this.db.getKnex())('participations');
  }

  async findById(id: number): Promise<Participation | null> {
    const result = await this.query().where('id', id).first();

    return result || null;
  }

  async findByChallenge(challengeId: number): Promise<Participation[]> {
    return this.query().where('challenge_id', challengeId).orderBy('created_at', 'asc');
  }

  async exists(userId: number, challengeId: number): Promise<boolean> {
    const result = await this.query()
      .where({ user_id: userId, challenge_id: challengeId })
      .first('id');

    return result !== undefined;
  }

  /**
   * Inserts within the caller's transaction. A second row for the same user and
   * challenge fails with a unique violation (23505).
   */
  async insert(fields: NewParticipation, trx: Knex.Transaction): Promise<Participation> {
    const [participation] = await this.query(trx).insert(fields).returning('*');

    return participation;
  }

  async markAccepted(
    trx: Knex.Transaction,
    challengeId: number,
    userId: number
  ): Promise<Participation | null> {
    const [participation] = await this.query(trx)
      .where({ challenge_id: challengeId, user_id: userId })
      .update({
        acceptation_status: 'accepted',
        accepted_at: trx.fn.now(),
        updated_at: trx.fn.now(),
      })
      .returning('*');

    return participation || null;
  }

  /**
   * Pending and accepted participations; rejected ones do not take a seat
   */
  async countActiveByChallenge(challengeId: number): Promise<number> {
    const result = await this.query()
      .where('challenge_id', challengeId)
      .whereIn('acceptation_status', ['pending', 'accepted'])
      .count('* as count')
      .first();

    return parseInt(String(result?.count ?? 0), 10) || 0;
  }
}
