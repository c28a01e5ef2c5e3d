import { afterEach, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/api/app.js';
import { makeEngine, testResult } from './helpers.js';

describe('HTTP API', () => {
  let app: FastifyInstance | null = null;

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  async function start() {
    const t = await makeEngine();
    const built = await buildApp(t.engine, { logger: false, rateLimitRpm: 1000 });
    app = built;
    return { ...t, app: built };
  }

  it('reports health', async () => {
    const { app } = await start();
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, data: { service: 'phasegate', enforcement: 'strict', signing: true } });
  });

  it('creates tasks and records evidence for them', async () => {
    const { app } = await start();
    const created = await app.inject({ method: 'POST', url: '/api/tasks', payload: { slug: 'rate-limit' } });
    expect(created.statusCode).toBe(201);
    const taskId: string = created.json().data.id;

    const evidence = await app.inject({
      method: 'POST',
      url: `/api/tasks/${taskId}/evidence`,
      payload: testResult('ignored', 'CL-1')
    });
    expect(evidence.statusCode).toBe(201);
    expect(evidence.json().data).toMatchObject({ id: 'EVID-2025W44-001', task_id: taskId });

    const lookup = await app.inject({ method: 'GET', url: '/api/evidence/EVID-2025W44-001' });
    expect(lookup.json().data.freshness).toBe('fresh');

    const detail = await app.inject({ method: 'GET', url: `/api/tasks/${taskId}` });
    expect(detail.json().data).toMatchObject({ phase: 'discovery', agents: { count: 0, required: 3 } });
    expect(detail.json().data.evidence).toHaveLength(1);

    const list = await app.inject({ method: 'GET', url: '/api/tasks' });
    expect(list.json().data).toEqual([{ id: taskId, lane: 'full', phase: 'discovery', started_at: '2025-10-30T12:00:00.000Z' }]);
  });

  it('maps engine errors to status codes', async () => {
    const { app } = await start();
    const invalid = await app.inject({ method: 'POST', url: '/api/tasks', payload: { lane: 'fast' } });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toMatchObject({ ok: false, error: { code: 'SCHEMA_VIOLATION' } });

    const missing = await app.inject({ method: 'GET', url: '/api/tasks/ghost-20251030T120000Z-zzzzzz' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json().error.message).toBe('Unknown task: ghost-20251030T120000Z-zzzzzz');

    const unknownEvidence = await app.inject({ method: 'GET', url: '/api/evidence/EVID-2025W44-042' });
    expect(unknownEvidence.json().error.remediation).toBe('Append the evidence record first and reference the id it returns');
  });

  it('binds, audits and refuses an unready advance', async () => {
    const { app, engine } = await start();
    const task = await engine.tasks.create('rate-limit');
    const bind = (ids: string[]) =>
      app.inject({
        method: 'POST',
        url: `/api/tasks/${task.id}/bind`,
        payload: { plan_item_id: 'P-1', checklist_item_ids: ids, required_evidence_type: 'test_result' }
      });

    expect((await bind(['CL-1'])).statusCode).toBe(200);
    const conflict = await bind(['CL-2']);
    expect(conflict.statusCode).toBe(409);
    expect(conflict.json().error.code).toBe('DUPLICATE_PLAN_ID');

    const audit = await app.inject({
      method: 'POST',
      url: `/api/tasks/${task.id}/audit`,
      payload: { checklist: '- [x] CL-1: done\n- [ ] CL-2: later' }
    });
    expect(audit.json().data.items).toEqual({ 'CL-1': 'MISSING' });
    expect(audit.json().data.report).toMatchObject({ total: 2, complete_without_evidence: 1, incomplete: 1 });

    const advance = await app.inject({ method: 'POST', url: `/api/tasks/${task.id}/advance`, payload: {} });
    expect(advance.statusCode).toBe(409);
    expect(advance.json().data.unmet.map((u: { code: string }) => u.code)).toEqual(['MISSING_EVIDENCE_TYPE']);
  });

  it('evaluates lifecycle events and keeps a feed', async () => {
    const { app } = await start();
    const gate = await app.inject({ method: 'POST', url: '/api/events', payload: { event_type: 'pre_push' } });
    expect(gate.json().data).toEqual({
      allow: false,
      reasons: ['No active task: create a task first (phasegate task create <slug>)'],
      warnings: []
    });

    const feed = await app.inject({ method: 'GET', url: '/api/feed?limit=5' });
    expect(feed.json().data.map((e: { type: string }) => e.type)).toEqual(['gate.result']);

    const kpi = await app.inject({ method: 'GET', url: '/api/kpi' });
    expect(kpi.json().data).toMatchObject({ detections: 0, auto_fix_success_rate: null });
  });
});
