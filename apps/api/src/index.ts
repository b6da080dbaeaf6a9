/**
 * Loandesk API Server
 * Fastify + Zod backend service
 */

import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { closePool } from './db/index.js';
import { getRepositories } from './repositories/index.js';
import { bootstrapReferenceData } from './services/reference-data.service.js';

async function main() {
  const config = loadConfig();
  const fastify = await buildApp({ config });

  fastify.addHook('onClose', async () => {
    await closePool();
  });

  try {
    await bootstrapReferenceData(getRepositories(), {
      departments: config.DEFAULT_DEPARTMENTS,
      positionsPerDepartment: config.DEFAULT_POSITIONS_PER_DEPARTMENT,
    }, fastify.log);

    await fastify.listen({ port: config.PORT, host: config.HOST });
    fastify.log.info(`Server running at http://${config.HOST}:${config.PORT}`);
  } catch (err) {
    fastify.log.error(err);
    await fastify.close();
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
