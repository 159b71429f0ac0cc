import Fastify from 'fastify';
import type { MemberRepository } from '../repository/member-repository.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerMemberRoutes } from './routes/members.js';

export interface ServerOptions {
  logger?: boolean;
}

export function buildServer(repository: MemberRepository, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerMemberRoutes(instance, repository);
  }, { prefix });

  return app;
}
