import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteOpts } from '../types.js';
import { parseRequest } from '../types.js';
import { ScheduleCreateSchema, ScheduleUpdateSchema } from '../../shared/schemas.js';
import { NotFoundError } from '../../shared/errors.js';
import {
  createSchedule,
  deleteSchedule,
  getSchedule,
  listSchedules,
  toggleSchedule,
  updateSchedule,
} from '../../scheduler/schedules.js';
import type { SchedulePatch } from '../../scheduler/schedules.js';
import { nextRunTimes } from '../../scheduler/cron.js';

type IdParams = { Params: { id: string } };

const NextQuerySchema = z.object({ count: z.coerce.number().int().min(1).max(50).default(5) });

export async function registerScheduleRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.post('/v1/schedules', async (req, reply) => {
    const body = parseRequest(ScheduleCreateSchema, req.body);
    const schedule = createSchedule(opts.db, {
      name: body.name,
      cron_expression: body.cron_expression,
      job_config: { definition: body.job_config.definition, inputs: body.job_config.inputs },
      is_active: body.is_active,
    });
    return reply.status(201).send(schedule);
  });

  fastify.get('/v1/schedules', async () => {
    return { schedules: listSchedules(opts.db) };
  });

  fastify.get<IdParams>('/v1/schedules/:id', async (req) => {
    const schedule = getSchedule(opts.db, req.params.id);
    if (!schedule) throw new NotFoundError(`Schedule ${req.params.id} not found`);
    return schedule;
  });

  fastify.put<IdParams>('/v1/schedules/:id', async (req) => {
    const body = parseRequest(ScheduleUpdateSchema, req.body);
    const patch: SchedulePatch = { name: body.name, cron_expression: body.cron_expression };
    if (body.job_config) {
      patch.job_config = { definition: body.job_config.definition, inputs: body.job_config.inputs };
    }
    return updateSchedule(opts.db, req.params.id, patch);
  });

  fastify.patch<IdParams>('/v1/schedules/:id/toggle', async (req) => {
    return toggleSchedule(opts.db, req.params.id);
  });

  fastify.get<IdParams>('/v1/schedules/:id/next', async (req) => {
    const schedule = getSchedule(opts.db, req.params.id);
    if (!schedule) throw new NotFoundError(`Schedule ${req.params.id} not found`);
    const { count } = parseRequest(NextQuerySchema, req.query);
    return {
      id: schedule.id,
      cron_expression: schedule.cron_expression,
      next: nextRunTimes(schedule.cron_expression, count).map((d) => d.toISOString()),
    };
  });

  fastify.delete<IdParams>('/v1/schedules/:id', async (req) => {
    return { deleted: deleteSchedule(opts.db, req.params.id) };
  });
}
