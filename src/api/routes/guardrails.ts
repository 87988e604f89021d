import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';
import { parseRequest } from '../types.js';
import { GuardrailValidateSchema } from '../../shared/schemas.js';
import { validateOutput } from '../../guardrails/engine.js';

export async function registerGuardrailRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  // Ad-hoc check of an output against a rule config, without an execution
  fastify.post('/v1/guardrails/validate', async (req) => {
    const body = parseRequest(GuardrailValidateSchema, req.body);
    return validateOutput(body.output, body.config, { records: opts.orchestrator.ctx.records });
  });
}
