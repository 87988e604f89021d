import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteOpts } from '../types.js';
import { parseRequest } from '../types.js';
import { ExecutionListQuerySchema, ExecutionRequestSchema } from '../../shared/schemas.js';
import { NotFoundError } from '../../shared/errors.js';
import { getExecution, listExecutions } from '../../execution/status.js';
import { allTasksTerminal, listTaskStatuses, taskRollup } from '../../tracking/task-status.js';
import { listErrorTraces } from '../../tracking/error-traces.js';
import { listTraces } from '../../events/observers/tracing.js';
import { listExecutionLogs } from '../../events/observers/streaming.js';
import type { ExecutionRecord } from '../../execution/types.js';

type JobParams = { Params: { jobId: string } };

const LogsQuerySchema = z.object({ after: z.coerce.number().int().min(0).default(0) });
const CancelBodySchema = z.object({ reason: z.string().min(1).optional() }).default({});

export async function registerExecutionRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const requireExecution = (jobId: string): ExecutionRecord => {
    const execution = getExecution(opts.db, jobId);
    if (!execution) throw new NotFoundError(`Execution ${jobId} not found`);
    return execution;
  };

  fastify.post(
    '/v1/executions',
    { config: { rateLimit: { max: 30, timeWindow: '1 minute' } } },
    async (req, reply) => {
      const body = parseRequest(ExecutionRequestSchema, req.body);
      const execution = opts.orchestrator.launch({
        definition: body.definition,
        inputs: body.inputs,
        runName: body.run_name ?? null,
        triggerType: 'api',
      });
      return reply.status(202).send({
        job_id: execution.job_id,
        status: execution.status,
        created_at: execution.created_at,
      });
    },
  );

  fastify.get('/v1/executions', async (req) => {
    const query = parseRequest(ExecutionListQuerySchema, req.query);
    const executions = listExecutions(opts.db, query);
    return { executions, limit: query.limit, offset: query.offset };
  });

  fastify.get<JobParams>('/v1/executions/:jobId', async (req) => {
    const execution = requireExecution(req.params.jobId);
    return {
      ...execution,
      tasks: listTaskStatuses(opts.db, execution.job_id),
      rollup: taskRollup(opts.db, execution.job_id),
    };
  });

  fastify.get<JobParams>('/v1/executions/:jobId/tasks', async (req) => {
    const { job_id } = requireExecution(req.params.jobId);
    return {
      job_id,
      tasks: listTaskStatuses(opts.db, job_id),
      all_terminal: allTasksTerminal(opts.db, job_id),
    };
  });

  fastify.get<JobParams>('/v1/executions/:jobId/errors', async (req) => {
    const { job_id } = requireExecution(req.params.jobId);
    return { job_id, errors: listErrorTraces(opts.db, job_id) };
  });

  fastify.get<JobParams>('/v1/executions/:jobId/traces', async (req) => {
    const { job_id } = requireExecution(req.params.jobId);
    return { job_id, traces: listTraces(opts.db, job_id) };
  });

  fastify.get<JobParams>('/v1/executions/:jobId/logs', async (req) => {
    const { job_id } = requireExecution(req.params.jobId);
    const { after } = parseRequest(LogsQuerySchema, req.query);
    return { job_id, logs: listExecutionLogs(opts.db, job_id, after) };
  });

  fastify.post<JobParams>('/v1/executions/:jobId/cancel', async (req) => {
    const { reason } = parseRequest(CancelBodySchema, req.body);
    return opts.orchestrator.cancel(req.params.jobId, reason);
  });

  fastify.delete<JobParams>('/v1/executions/:jobId', async (req) => {
    return { deleted: opts.orchestrator.delete(req.params.jobId) };
  });
}
