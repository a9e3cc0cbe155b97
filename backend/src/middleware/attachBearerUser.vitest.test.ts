import { beforeEach, describe, expect, it } from 'vitest';
import express from 'express';
import jwt from 'jsonwebtoken';
import request from 'supertest';
import { attachBearerUser, resolveUserId, signAccessToken } from './attachBearerUser.js';

const createApp = () => {
  const app = express();
  app.use(attachBearerUser);
  app.get('/whoami', (req, res) => {
    res.json({ user: req.user ?? null });
  });
  return app;
};

beforeEach(() => {
  process.env.AUTH_JWT_SECRET = 'test-secret';
});

describe('attachBearerUser', () => {
  it('attaches the user from a valid token', async () => {
    const response = await request(createApp())
      .get('/whoami')
      .set('Authorization', `Bearer ${signAccessToken(42)}`);

    expect(response.body).toEqual({ user: { id: 42 } });
  });

  it('passes through without a user for missing or bad tokens', async () => {
    const app = createApp();

    const anonymous = await request(app).get('/whoami');
    const forged = await request(app)
      .get('/whoami')
      .set('Authorization', `Bearer ${jwt.sign({ sub: '42' }, 'other-secret')}`);
    const garbage = await request(app).get('/whoami').set('Authorization', 'Bearer not-a-token');

    expect(anonymous.body).toEqual({ user: null });
    expect(forged.body).toEqual({ user: null });
    expect(garbage.body).toEqual({ user: null });
  });
});

describe('resolveUserId', () => {
  it('accepts positive integer subjects only', () => {
    expect(resolveUserId({ sub: '7' })).toBe(7);
    expect(resolveUserId({ sub: 'abc' })).toBeNull();
    expect(resolveUserId({ sub: '0' })).toBeNull();
    expect(resolveUserId({})).toBeNull();
    expect(resolveUserId('7')).toBeNull();
  });
});
