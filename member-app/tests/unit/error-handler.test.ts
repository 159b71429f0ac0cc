import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { CompositionError, NonUniqueResultError } from '../../../src/index.js';
import { registerErrorHandler } from '../../src/api/middleware/error-handler.js';
import { MemberNotFoundError } from '../../src/domain/errors.js';

let app: FastifyInstance | null = null;

afterEach(async () => {
  await app?.close();
  app = null;
});

async function failingWith(error: unknown): Promise<FastifyInstance> {
  const instance = Fastify({ logger: false });
  registerErrorHandler(instance);
  instance.get('/fail', async () => {
    throw error;
  });
  await instance.ready();
  return instance;
}

describe('registerErrorHandler', () => {
  it('maps MemberNotFoundError to 404', async () => {
    app = await failingWith(new MemberNotFoundError("Member '7' not found"));
    const res = await app.inject({ method: 'GET', url: '/fail' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'MemberNotFoundError', message: "Member '7' not found" });
  });

  it('maps CompositionError to 400', async () => {
    app = await failingWith(new CompositionError('from() requires at least one source'));
    const res = await app.inject({ method: 'GET', url: '/fail' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'CompositionError', message: 'from() requires at least one source' });
  });

  it('maps NonUniqueResultError to 409', async () => {
    app = await failingWith(new NonUniqueResultError(2));
    const res = await app.inject({ method: 'GET', url: '/fail' });
    expect(res.statusCode).toBe(409);
    expect(res.json().error).toBe('NonUniqueResultError');
  });

  it('hides unexpected errors behind a 500', async () => {
    app = await failingWith(new Error('connection refused'));
    const res = await app.inject({ method: 'GET', url: '/fail' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'InternalError', message: 'Internal server error' });
  });
});
