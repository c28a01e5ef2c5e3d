import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { Engine } from '../core/engine.js';
import { isPhaseGateError, SchemaViolation, type ErrorCode } from '../core/errors.js';
import { EvidenceTypeSchema } from '../core/evidence-schema.js';
import { nextPhase, PHASES } from '../core/phases.js';
import { currentPhase } from '../core/tasks.js';
import type { EventRing } from './feed.js';

const TaskCreateBody = z.object({
  slug: z.string().min(1).max(120),
  lane: z.enum(['fast', 'full']).default('full')
});

const BindBody = z.object({
  plan_item_id: z.string().min(1),
  checklist_item_ids: z.array(z.string().min(1)).min(1),
  required_evidence_type: EvidenceTypeSchema,
  plan_section: z.string().optional(),
  plan_text: z.string().optional(),
  keywords: z.array(z.string().min(1)).optional()
});

const AuditBody = z.object({
  checklist: z.string().optional()
});

const AdvanceBody = z.object({
  from: z.enum(PHASES).optional(),
  to: z.enum(PHASES).optional()
});

const RollbackBody = z.object({
  phase: z.enum(PHASES),
  reason: z.string().min(1).max(2000),
  actor: z.string().min(1).max(120)
});

const AgentBody = z.object({
  agent_name: z.string().min(1).max(120),
  depth: z.number().int(),
  invoked_at: z.number().int().positive(),
  signature: z.string().min(1)
});

const AgentCompleteBody = z.object({
  status: z.enum(['success', 'failure', 'timeout'])
});

const KpiQuery = z.object({
  since: z.coerce.number().int().min(0).optional(),
  until: z.coerce.number().int().positive().optional()
});

const FeedQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional()
});

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SchemaViolation(issue && issue.path.length > 0 ? issue.path.join('.') : 'body', issue?.message ?? 'invalid request');
  }
  return parsed.data;
}

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  NOT_FOUND: 404,
  COLLISION: 409,
  DUPLICATE_PLAN_ID: 409,
  BUCKET_EXHAUSTED: 409
};

function sendError(reply: FastifyReply, err: unknown) {
  if (isPhaseGateError(err)) {
    return reply.code(STATUS_BY_CODE[err.code] ?? 400).send({ ok: false, error: err.toJSON() });
  }
  reply.log.error({ err }, 'request failed');
  return reply.code(500).send({ ok: false, error: { code: 'INTERNAL', message: 'Internal error' } });
}

export async function registerRoutes(app: FastifyInstance, engine: Engine, feed: EventRing) {
  app.setErrorHandler((err, _req, reply) => {
    if (err.validation || err.statusCode === 400) {
      return reply.code(400).send({ ok: false, error: { code: 'SCHEMA_VIOLATION', message: err.message } });
    }
    if (err.statusCode === 429) return reply.code(429).send({ ok: false, error: { code: 'RATE_LIMITED', message: err.message } });
    return sendError(reply, err);
  });

  app.get('/api/health', async () => ({
    ok: true,
    data: {
      service: 'phasegate',
      enforcement: engine.policy.enforcement.mode,
      signing: engine.signingConfigured,
      ts: Date.now()
    }
  }));

  app.get('/api/tasks', async () => {
    const ids = await engine.tasks.list();
    const tasks = [];
    for (const id of ids) {
      const task = await engine.tasks.resolve(id);
      tasks.push({ id, lane: task.lane, phase: currentPhase(task), started_at: task.started_at });
    }
    return { ok: true, data: tasks };
  });

  app.post('/api/tasks', async (req, reply) => {
    const body = parse(TaskCreateBody, req.body);
    const task = await engine.tasks.create(body.slug, { lane: body.lane });
    return reply.code(201).send({ ok: true, data: task });
  });

  app.get<{ Params: { id: string } }>('/api/tasks/:id', async (req) => {
    const task = await engine.tasks.resolve(req.params.id);
    return {
      ok: true,
      data: {
        task,
        phase: currentPhase(task),
        agents: { count: engine.agents.count(task.id), required: task.required_agent_count },
        invocations: engine.agents.list(task.id),
        evidence: await engine.evidence.entries({ taskId: task.id })
      }
    };
  });

  app.post<{ Params: { id: string } }>('/api/tasks/:id/evidence', async (req, reply) => {
    const task = await engine.tasks.resolve(req.params.id);
    const body = typeof req.body === 'object' && req.body !== null ? req.body : {};
    const record = await engine.evidence.append({ ...body, task_id: task.id });
    return reply.code(201).send({ ok: true, data: record });
  });

  app.get<{ Params: { id: string } }>('/api/evidence/:id', async (req) => {
    const record = await engine.evidence.require(req.params.id);
    return { ok: true, data: { record, freshness: engine.evidence.freshness(record) } };
  });

  app.post<{ Params: { id: string } }>('/api/tasks/:id/bind', async (req) => {
    const body = parse(BindBody, req.body);
    const mapping = await engine.mapping(req.params.id);
    const entry = await mapping.bind(body.plan_item_id, body.checklist_item_ids, body.required_evidence_type, {
      planSection: body.plan_section,
      planText: body.plan_text,
      keywords: body.keywords
    });
    return { ok: true, data: entry };
  });

  app.post<{ Params: { id: string } }>('/api/tasks/:id/audit', async (req) => {
    const body = parse(AuditBody, req.body);
    const text = body.checklist ?? (await engine.checklistText(req.params.id)) ?? '';
    return { ok: true, data: await engine.audit(req.params.id, text) };
  });

  app.post<{ Params: { id: string } }>('/api/tasks/:id/advance', async (req, reply) => {
    const body = parse(AdvanceBody, req.body);
    const task = await engine.tasks.resolve(req.params.id);
    const from = body.from ?? currentPhase(task);
    const to = body.to ?? nextPhase(from) ?? from;
    const result = await engine.machine.attemptAdvance(task.id, from, to);
    if (!result.ok) return reply.code(409).send({ ok: false, data: result });
    return { ok: true, data: result };
  });

  app.post<{ Params: { id: string } }>('/api/tasks/:id/rollback', async (req) => {
    const body = parse(RollbackBody, req.body);
    const task = await engine.machine.rollbackTo(req.params.id, body.phase, { reason: body.reason, actor: body.actor });
    return { ok: true, data: task };
  });

  app.get<{ Params: { id: string } }>('/api/tasks/:id/receipts', async (req) => {
    return { ok: true, data: await engine.machine.verifyReceipts(req.params.id) };
  });

  app.post<{ Params: { id: string } }>('/api/tasks/:id/agents', async (req, reply) => {
    const body = parse(AgentBody, req.body);
    const invocation = await engine.agents.record(req.params.id, {
      agentName: body.agent_name,
      depth: body.depth,
      invokedAt: body.invoked_at,
      signature: body.signature
    });
    return reply.code(201).send({ ok: true, data: invocation });
  });

  app.post<{ Params: { invocationId: string } }>('/api/invocations/:invocationId/complete', async (req) => {
    const body = parse(AgentCompleteBody, req.body);
    return { ok: true, data: engine.agents.complete(req.params.invocationId, body.status) };
  });

  app.post('/api/events', async (req) => {
    const decision = await engine.gate.handle(req.body ?? {});
    return { ok: true, data: decision };
  });

  app.get('/api/kpi', async (req) => {
    const q = parse(KpiQuery, req.query);
    const fallback = engine.kpi.defaultPeriod();
    const report = await engine.kpiReport({ since: q.since ?? fallback.since, until: q.until ?? fallback.until });
    return { ok: true, data: report };
  });

  app.get('/api/feed', async (req) => {
    const q = parse(FeedQuery, req.query);
    return { ok: true, data: feed.toArray(q.limit) };
  });
}
