import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { NOW, buildChallenge } from '../utils/fakes.js';
import { TestApp, createTestApp } from '../utils/app.js';

describe('Challenges API', () => {
  let testApp: TestApp;

  beforeEach(() => {
    testApp = createTestApp();
  });

  it('creates a challenge with a fresh invitation token', async () => {
    const res = await request(testApp.app)
      .post('/api/challenges')
      .auth('admin', 'test-secret')
      .send({
        title: '  Cold showers  ',
        creatorId: 9,
        sponsored: true,
        submissionEndsAt: '2026-07-01T00:00:00Z',
      });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      id: 100,
      title: 'Cold showers',
      description: '',
      creatorId: 9,
      open: false,
      sponsored: true,
      participationsCount: 0,
      status: 'open',
      submissionEndsAt: '2026-07-01T00:00:00.000Z',
    });
    expect(res.body.invitationToken).toMatch(/^[0-9a-f]{32}$/);
  });

  it('requires admin credentials to create a challenge', async () => {
    const res = await request(testApp.app)
      .post('/api/challenges')
      .auth('admin', 'wrong-password')
      .send({ title: 'Cold showers', creatorId: 9 });

    expect(res.status).toBe(401);
    expect(testApp.db.challenges).toHaveLength(0);
  });

  it.each([
    [{ creatorId: 9 }, 'title', 'title is required'],
    [{ title: 'Run', creatorId: 9, description: 3 }, 'description', 'description must be a string'],
    [{ title: 'Run', creatorId: -1 }, 'creatorId', 'creatorId must be a positive integer'],
    [{ title: 'Run', creatorId: 9, open: 'yes' }, 'open', 'open must be a boolean'],
    [{ title: 'Run', creatorId: 9, sponsored: 1 }, 'sponsored', 'sponsored must be a boolean'],
    [
      { title: 'Run', creatorId: 9, submissionEndsAt: 'tomorrow' },
      'submissionEndsAt',
      'submissionEndsAt must be an ISO date',
    ],
  ])('rejects invalid input %#', async (body, field, message) => {
    const res = await request(testApp.app)
      .post('/api/challenges')
      .auth('admin', 'test-secret')
      .send(body);

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'VALIDATION_ERROR', message, field });
  });

  it('returns a challenge by id', async () => {
    testApp.db.challenges.push(buildChallenge({ id: 2, status: 'full', participations_count: 2 }));

    const res = await request(testApp.app).get('/api/challenges/2');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      id: 2,
      title: 'Morning run',
      description: 'Run every morning',
      creatorId: 9,
      open: false,
      sponsored: false,
      participationsCount: 2,
      invitationToken: 'invite-token-1',
      status: 'full',
      createdAt: NOW.toISOString(),
      updatedAt: NOW.toISOString(),
    });
  });

  it('returns 404 for an unknown challenge', async () => {
    const res = await request(testApp.app).get('/api/challenges/2');

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('CHALLENGE_NOT_FOUND');
  });

  it('lists all challenges', async () => {
    testApp.db.challenges.push(buildChallenge({ id: 1 }), buildChallenge({ id: 2 }));

    const res = await request(testApp.app).get('/api/challenges');

    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(2);
  });

  it('deletes a challenge', async () => {
    testApp.db.challenges.push(buildChallenge({ id: 2 }));

    const res = await request(testApp.app).delete('/api/challenges/2').auth('admin', 'test-secret');

    expect(res.status).toBe(204);
    expect(testApp.db.challenges).toHaveLength(0);
  });

  it('returns 404 when deleting an unknown challenge', async () => {
    const res = await request(testApp.app).delete('/api/challenges/2').auth('admin', 'test-secret');

    expect(res.status).toBe(404);
  });
});
