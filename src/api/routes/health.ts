import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';
import { listExecutions } from '../../execution/status.js';

export async function registerHealthRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/health', async () => {
    opts.db.prepare('SELECT 1').get();
    return {
      status: 'ok',
      version: opts.config.version,
      workspace_id: opts.config.workspace_id,
      running: listExecutions(opts.db, { status: 'RUNNING', limit: 500 }).length,
    };
  });
}
