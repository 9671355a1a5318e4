import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { NOW, buildChallenge, buildParticipation } from '../utils/fakes.js';
import { TestApp, createTestApp } from '../utils/app.js';

describe('Participations API', () => {
  let testApp: TestApp;

  beforeEach(() => {
    testApp = createTestApp();
  });

  describe('POST /api/participations', () => {
    it('creates a pending participation', async () => {
      testApp.db.challenges.push(buildChallenge({ id: 1, creator_id: 9 }));

      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: 5, challengeId: 1 });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        id: 1,
        userId: 5,
        challengeId: 1,
        acceptationStatus: 'pending',
        createdAt: NOW.toISOString(),
        updatedAt: NOW.toISOString(),
      });
      expect(testApp.notify).toHaveBeenCalledTimes(1);
      expect(testApp.recompute).toHaveBeenCalledWith(1);
    });

    it('accepts immediately when the challenge is open', async () => {
      testApp.db.challenges.push(buildChallenge({ open: true }));

      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: '5', challengeId: '1' });

      expect(res.status).toBe(201);
      expect(res.body.acceptationStatus).toBe('accepted');
      expect(res.body.acceptedAt).toBe(NOW.toISOString());
      expect(testApp.notify).not.toHaveBeenCalled();
    });

    it('joins through an invitation token', async () => {
      testApp.db.challenges.push(buildChallenge({ id: 4, invitation_token: 'join-me' }));

      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: 5, challengeId: 999, invitationToken: 'join-me' });

      expect(res.status).toBe(201);
      expect(res.body.challengeId).toBe(4);
    });

    it('rejects joins to a full challenge', async () => {
      testApp.db.challenges.push(buildChallenge({ participations_count: 2 }));

      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: 5, challengeId: 1 });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: 'JOINING_BLOCKED',
          message: 'Challenge is not accepting more participants',
        },
      });
      expect(testApp.db.participations).toHaveLength(0);
    });

    it('rejects joins after the submission deadline', async () => {
      testApp.db.challenges.push(buildChallenge({ submission_ends_at: '2026-05-01T00:00:00Z' }));

      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: 5, challengeId: 1 });

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'JOINING_BLOCKED',
        message: 'Challenge submissions have ended',
      });
    });

    it('rejects a second participation of the same user', async () => {
      testApp.db.challenges.push(buildChallenge());
      testApp.db.participations.push(buildParticipation({ id: 77 }));

      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: 5, challengeId: 1 });

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'DUPLICATE_PARTICIPATION',
        message: 'User already participates in this challenge',
      });
    });

    it('returns 404 for an unknown invitation token', async () => {
      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: 5, invitationToken: 'no-such-token' });

      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({
        code: 'CHALLENGE_NOT_FOUND',
        message: 'Challenge not found',
      });
    });

    it('requires a user id', async () => {
      const res = await request(testApp.app).post('/api/participations').send({ challengeId: 1 });

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'userId is required',
        field: 'userId',
      });
    });

    it('requires a challenge id or an invitation token', async () => {
      const res = await request(testApp.app).post('/api/participations').send({ userId: 5 });

      expect(res.status).toBe(400);
      expect(res.body.error.field).toBe('challengeId');
      expect(res.body.error.message).toBe('challengeId or invitationToken is required');
    });

    it('rejects a challenge id beyond the int4 range before any lookup', async () => {
      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: 5, challengeId: 2147483648 });

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'challengeId must be a positive integer',
        field: 'challengeId',
      });
    });

    it('rejects a user id beyond the int4 range', async () => {
      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: '2147483648', challengeId: 1 });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('userId must be a positive integer');
    });

    it('rejects an unknown acceptation status', async () => {
      const res = await request(testApp.app)
        .post('/api/participations')
        .send({ userId: 5, challengeId: 1, acceptationStatus: 'maybe' });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe(
        'acceptationStatus must be one of pending, accepted, rejected'
      );
    });

    it('rejects a malformed JSON body', async () => {
      const res = await request(testApp.app)
        .post('/api/participations')
        .set('Content-Type', 'application/json')
        .send('{"userId":');

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body',
      });
    });

    it('answers with a correlation id header', async () => {
      const res = await request(testApp.app)
        .post('/api/participations')
        .set('X-Correlation-Id', 'corr-1')
        .send({ userId: 5 });

      expect(res.headers['x-correlation-id']).toBe('corr-1');
    });
  });

  describe('POST /api/participations/:id/accept', () => {
    it('requires admin credentials', async () => {
      testApp.db.participations.push(buildParticipation({ id: 3 }));

      const res = await request(testApp.app).post('/api/participations/3/accept');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Admin access required' },
      });
      expect(testApp.db.participations[0].acceptation_status).toBe('pending');
    });

    it('accepts a pending participation', async () => {
      testApp.db.participations.push(buildParticipation({ id: 3, challenge_id: 2 }));

      const res = await request(testApp.app)
        .post('/api/participations/3/accept')
        .auth('admin', 'test-secret');

      expect(res.status).toBe(200);
      expect(res.body.acceptationStatus).toBe('accepted');
      expect(testApp.recompute).toHaveBeenCalledWith(2);
    });

    it('refuses to accept a rejected participation', async () => {
      testApp.db.participations.push(buildParticipation({ id: 3, acceptation_status: 'rejected' }));

      const res = await request(testApp.app)
        .post('/api/participations/3/accept')
        .auth('admin', 'test-secret');

      expect(res.status).toBe(409);
      expect(res.body.error).toEqual({
        code: 'CONFLICT',
        message: 'Only pending participations can be accepted',
      });
    });

    it('returns 404 for an unknown participation', async () => {
      const res = await request(testApp.app)
        .post('/api/participations/3/accept')
        .auth('admin', 'test-secret');

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Participation not found');
    });
  });

  describe('GET routes', () => {
    it('returns a participation by id', async () => {
      testApp.db.participations.push(buildParticipation({ id: 3 }));

      const res = await request(testApp.app).get('/api/participations/3');

      expect(res.status).toBe(200);
      expect(res.body.id).toBe(3);
    });

    it('validates the participation id', async () => {
      const res = await request(testApp.app).get('/api/participations/abc');

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('id must be a positive integer');
    });

    it('rejects a participation id beyond the int4 range', async () => {
      const res = await request(testApp.app).get('/api/participations/2147483648');

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('lists the participations of a challenge', async () => {
      testApp.db.challenges.push(buildChallenge({ id: 1 }));
      testApp.db.participations.push(
        buildParticipation({ id: 1, user_id: 5 }),
        buildParticipation({ id: 2, user_id: 6 }),
        buildParticipation({ id: 3, user_id: 5, challenge_id: 2 })
      );

      const res = await request(testApp.app).get('/api/challenges/1/participations');

      expect(res.status).toBe(200);
      expect(res.body.map((p: { id: number }) => p.id)).toEqual([1, 2]);
    });

    it('returns 404 when listing participations of an unknown challenge', async () => {
      const res = await request(testApp.app).get('/api/challenges/8/participations');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('CHALLENGE_NOT_FOUND');
    });

    it('returns the notifications of a user', async () => {
      testApp.notifications.push({
        id: 1,
        recipient_id: 9,
        kind: 'pending_participation',
        challenge_id: 1,
        participation_id: 4,
        read_at: null,
        created_at: NOW,
      });

      const res = await request(testApp.app).get('/api/users/9/notifications');

      expect(res.status).toBe(200);
      expect(res.body).toEqual([
        {
          id: 1,
          recipientId: 9,
          kind: 'pending_participation',
          challengeId: 1,
          participationId: 4,
          createdAt: NOW.toISOString(),
        },
      ]);
    });

    it('answers unknown routes with NOT_FOUND', async () => {
      const res = await request(testApp.app).get('/api/nothing-here');

      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({
        code: 'NOT_FOUND',
        message: 'Cannot GET /api/nothing-here',
      });
    });
  });
});
