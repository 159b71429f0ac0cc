import pg from 'pg';
import { PostgresDataSource, QueryExecutor } from '../../src/index.js';
import { buildServer } from './api/server.js';
import { applySchema } from './db/schema.js';
import { MemberRepository } from './repository/member-repository.js';

const DATABASE_URL = process.env['DATABASE_URL'];
if (!DATABASE_URL) {
  console.error('Error: DATABASE_URL environment variable is required');
  process.exit(1);
}

const PORT = parseInt(process.env['PORT'] ?? '3000', 10);

const pool = new pg.Pool({ connectionString: DATABASE_URL });

const schemaClient = await pool.connect();
try {
  await applySchema(schemaClient);
} finally {
  schemaClient.release();
}

const source = new PostgresDataSource({ pool });
const executor = new QueryExecutor({ source });
const app = buildServer(new MemberRepository(executor));

try {
  await app.listen({ port: PORT, host: '0.0.0.0' });
} catch (err) {
  app.log.error(err);
  await source.close();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
  await source.close();
});
