import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type Database from 'better-sqlite3';
import { getCrewlinePaths } from '../workspace/paths.js';
import { closeDb, openDb } from '../workspace/db.js';
import { readWorkspaceConfig } from '../workspace/config.js';
import type { WorkspaceConfig } from '../workspace/types.js';
import { createOrchestrator } from '../execution/orchestrator.js';
import type { Orchestrator } from '../execution/orchestrator.js';
import type { LogHub } from '../events/observers/streaming.js';
import { SchedulerLoop } from '../scheduler/loop.js';
import { CrewlineError, httpStatusFor } from '../shared/errors.js';
import { createLogger, errorMessage, setLogLevel } from '../shared/logger.js';
import { registerExecutionRoutes } from './routes/executions.js';
import { registerScheduleRoutes } from './routes/schedules.js';
import { registerGuardrailRoutes } from './routes/guardrails.js';
import { registerHealthRoutes } from './routes/health.js';

const log = createLogger('api');

export interface ServerOptions {
  host?: string;
  port?: number;
  cwd?: string;
  /** Injected by tests; otherwise read from the workspace. */
  db?: Database.Database;
  config?: WorkspaceConfig;
  orchestrator?: Orchestrator;
  hub?: LogHub | null;
}

export interface CreatedServer {
  fastify: FastifyInstance;
  host: string;
  port: number;
  config: WorkspaceConfig;
  db: Database.Database;
  orchestrator: Orchestrator;
}

export async function createServer(opts: ServerOptions = {}): Promise<CreatedServer> {
  const paths = getCrewlinePaths(opts.cwd);
  const config = opts.config ?? readWorkspaceConfig(paths.config);
  setLogLevel(config.log_level);
  const db = opts.db ?? openDb(paths.stateDb);
  const orchestrator = opts.orchestrator ?? createOrchestrator(db, config, { hub: opts.hub ?? null });
  const host = opts.host ?? config.api.host;
  const port = opts.port ?? config.api.port;

  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  if (!isLoopback) {
    log.warn('Non-loopback bind requested; the API has no authentication', { host });
  }

  const fastify = Fastify({ logger: false, trustProxy: false });

  await fastify.register(cors, {
    origin: ['http://localhost', 'http://127.0.0.1', 'http://[::1]'],
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  // Only routes that opt in through `config.rateLimit` are limited
  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'no-referrer');
  });

  fastify.setErrorHandler((error, req, reply) => {
    const status = error instanceof CrewlineError ? httpStatusFor(error) : (error.statusCode ?? 500);
    if (status >= 500) {
      log.error('Request failed', { method: req.method, url: req.url, error: error.message });
    }
    return reply.status(status).send({
      error: status >= 500 && !(error instanceof CrewlineError) ? 'Internal server error' : error.message,
      code: error.code,
    });
  });

  const routeOpts = { db, config, orchestrator };
  await registerHealthRoutes(fastify, routeOpts);
  await registerExecutionRoutes(fastify, routeOpts);
  await registerScheduleRoutes(fastify, routeOpts);
  await registerGuardrailRoutes(fastify, routeOpts);

  return { fastify, host, port, config, db, orchestrator };
}

export interface StartOptions extends ServerOptions {
  /** Run the cron scheduler in the same process (default: config.scheduler.enabled). */
  scheduler?: boolean;
}

export async function startServer(opts: StartOptions = {}): Promise<void> {
  const { fastify, host, port, config, db, orchestrator } = await createServer(opts);

  const schedulerEnabled = opts.scheduler ?? config.scheduler.enabled;
  const scheduler = new SchedulerLoop(db, orchestrator, {
    intervalMs: config.scheduler.interval_seconds * 1000,
  });

  const shutdown = async (signal: string): Promise<void> => {
    log.info('Shutting down', { signal });
    scheduler.stop();
    await fastify.close();
    await orchestrator.drain();
    closeDb();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((e: unknown) => {
          log.error('Shutdown failed', { error: errorMessage(e) });
          process.exit(1);
        });
    });
  }

  try {
    await fastify.listen({ host, port });
    log.info('Crewline API server listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    log.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
  if (schedulerEnabled) scheduler.start();
}
