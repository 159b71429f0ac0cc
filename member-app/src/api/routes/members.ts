import type { FastifyInstance } from 'fastify';
import { MemberNotFoundError } from '../../domain/errors.js';
import type { MemberRepository } from '../../repository/member-repository.js';

interface MemberSearchQuerystring {
  username?: string;
  teamName?: string;
  ageGoe?: number;
  ageLoe?: number;
  offset?: number;
  limit?: number;
}

const searchSchema = {
  querystring: {
    type: 'object',
    properties: {
      username: { type: 'string' },
      teamName: { type: 'string' },
      ageGoe: { type: 'integer', minimum: 0 },
      ageLoe: { type: 'integer', minimum: 0 },
      offset: { type: 'integer', minimum: 0, default: 0 },
      limit: { type: 'integer', minimum: 1, maximum: 100, default: 20 },
    },
    additionalProperties: false,
  },
} as const;

const byIdSchema = {
  params: {
    type: 'object',
    properties: { id: { type: 'integer', minimum: 1 } },
    required: ['id'],
  },
} as const;

export async function registerMemberRoutes(app: FastifyInstance, repository: MemberRepository): Promise<void> {
  app.get<{ Querystring: MemberSearchQuerystring }>('/members', { schema: searchSchema }, async (request, reply) => {
    const { username, teamName, ageGoe, ageLoe, offset, limit } = request.query;
    const page = await repository.searchPage(
      { username, teamName, ageGoe, ageLoe },
      { offset: offset ?? 0, limit: limit ?? 20 },
    );
    return reply.status(200).send(page);
  });

  app.get<{ Params: { id: number } }>('/members/:id', { schema: byIdSchema }, async (request, reply) => {
    const { id } = request.params;
    const found = await repository.findById(id);
    if (found === null) {
      throw new MemberNotFoundError(`Member '${id}' not found`);
    }
    return reply.status(200).send(found);
  });
}
