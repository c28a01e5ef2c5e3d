import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { DuplicatePlanId, NotFoundError, SchemaViolation } from '../src/core/errors.js';
import { EvidenceStore } from '../src/core/evidence.js';
import { buildAuditReport, describeHollow, MappingStore } from '../src/core/mapping.js';
import { commandOutput, fixedClock, makeEngine, silentLog, testResult, tmpDir, writeFile } from './helpers.js';

async function makeMapping() {
  const root = await tmpDir();
  const evidence = new EvidenceStore({
    root: path.join(root, 'evidence'),
    log: silentLog,
    vcs: async () => ({ branch: 'feature/work', commit: 'abc1234' }),
    now: fixedClock()
  });
  const mapping = new MappingStore({ file: path.join(root, 'mapping.json'), evidence, log: silentLog });
  return { root, evidence, mapping };
}

describe('MappingStore', () => {
  it('starts empty with default document names', async () => {
    const { mapping } = await makeMapping();
    expect(await mapping.read()).toEqual({ version: 1, plan_file: 'plan.md', checklist_file: 'checklist.md', mappings: [] });
    expect(await mapping.size()).toBe(0);
  });

  it('binds a plan item and resolves it by id', async () => {
    const { mapping } = await makeMapping();
    const entry = await mapping.bind('P-1', ['CL-1', 'CL-2', 'CL-1'], 'test_result', {
      planSection: 'Rate limiting',
      planText: 'Limit requests per client'
    });

    expect(entry.checklist_items.map((c) => c.id)).toEqual(['CL-1', 'CL-2']);
    expect(await mapping.resolveByPlanId('P-1')).toEqual(['CL-1', 'CL-2']);
    expect([...(await mapping.requirements())]).toEqual([
      ['CL-1', 'test_result'],
      ['CL-2', 'test_result']
    ]);
  });

  it('is idempotent for the same binding and refuses a different one', async () => {
    const { mapping } = await makeMapping();
    await mapping.bind('P-1', ['CL-1'], 'test_result');
    await mapping.bind('P-1', ['CL-1'], 'code_review');
    expect(await mapping.size()).toBe(1);
    expect((await mapping.requirements()).get('CL-1')).toBe('code_review');

    const err = await mapping.bind('P-1', ['CL-2'], 'test_result').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DuplicatePlanId);
    expect(err).toMatchObject({ message: 'Plan item P-1 is already bound to [CL-1]' });
  });

  it('refuses a checklist id that another plan item owns', async () => {
    const { mapping } = await makeMapping();
    await mapping.bind('P-1', ['CL-1'], 'test_result');
    await expect(mapping.bind('P-2', ['CL-1'], 'artifact')).rejects.toMatchObject({
      code: 'DUPLICATE_PLAN_ID',
      boundTo: ['CL-1 (bound to P-1)']
    });
  });

  it('validates ids before touching the file', async () => {
    const { mapping } = await makeMapping();
    await expect(mapping.bind('bad id', ['CL-1'], 'test_result')).rejects.toBeInstanceOf(SchemaViolation);
    await expect(mapping.bind('P-1', [], 'test_result')).rejects.toMatchObject({ field: 'checklist_item_ids' });
    await expect(mapping.resolveByPlanId('P-9')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects a corrupted mapping file', async () => {
    const { mapping } = await makeMapping();
    await fs.writeFile(mapping.file, JSON.stringify({ version: 2, mappings: [] }));
    await expect(mapping.read()).rejects.toBeInstanceOf(SchemaViolation);
  });

  it('searches plan and checklist texts literally', async () => {
    const { mapping } = await makeMapping();
    await mapping.bind('P-1', ['CL-1'], 'test_result', {
      planSection: 'Limits',
      planText: 'Throttle (per client)',
      checklistTexts: { 'CL-1': 'Unit tests for the throttle' }
    });

    const hits = await mapping.search('THROTTLE');
    expect(hits.map((h) => [h.field, h.id])).toEqual([
      ['plan', 'P-1'],
      ['checklist', 'CL-1']
    ]);
    expect(await mapping.search('(per')).toHaveLength(1);
    expect(await mapping.search('T.rottle')).toEqual([]);
    expect(await mapping.search('   ')).toEqual([]);
  });
});

describe('checklist audit', () => {
  it('classifies items and flags hollow ones', async () => {
    const { mapping, evidence } = await makeMapping();
    await evidence.append(testResult('task-a', 'CL-1'));
    await evidence.append(commandOutput('task-a', 'CL-2'));
    await mapping.bind('P-1', ['CL-1', 'CL-2', 'CL-3', 'CL-9'], 'test_result');

    const text = [
      '- [x] CL-1: tests pass <!-- evidence: EVID-2025W44-001 -->',
      '- [x] CL-2: build output <!-- evidence: EVID-2025W44-002 -->',
      '- [x] CL-3: claimed without proof',
      '- [ ] CL-4: not done',
      '- [x] CL-5: unmapped <!-- evidence: EVID-2025W44-001 -->'
    ].join('\n');
    const report = await mapping.audit(text);

    expect(report).toMatchObject({
      total: 5,
      complete_with_evidence: 2,
      complete_without_evidence: 2,
      incomplete: 1,
      completion_ratio: 0.4,
      incomplete_items: [{ itemId: 'CL-4', line: 4 }],
      unmapped_items: ['CL-5'],
      orphaned_items: ['CL-9']
    });
    expect(report.hollow.map(describeHollow)).toEqual([
      'CL-2 (line 2): EVID-2025W44-002 is command_output, expected test_result',
      'CL-3 (line 3): no evidence reference within 5 lines of line 3'
    ]);
  });

  it('reports a zero ratio for an empty checklist', () => {
    expect(buildAuditReport([], new Map()).completion_ratio).toBe(0);
  });
});

describe('keyword requirements', () => {
  async function setup() {
    const { engine } = await makeEngine();
    const task = await engine.tasks.create('cache', { lane: 'fast' });
    await engine.evidence.append(testResult(task.id, 'P-1'));
    await engine.evidence.append(testResult(task.id, 'P-2'));
    const mapping = await engine.mapping(task.id);
    await mapping.bind('PLAN-1', ['P-1'], 'test_result', { keywords: ['performance'] });
    await mapping.bind('PLAN-2', ['P-2'], 'test_result', { keywords: [' performance ', ''] });
    const checklist = [
      '- [x] P-1: Tune the cache <!-- evidence: EVID-2025W44-001 -->',
      '```',
      '// performance notes go here',
      '```',
      '- [x] P-2: Checked performance under load <!-- evidence: EVID-2025W44-002 -->'
    ].join('\n');
    await writeFile(await engine.checklistPath(task.id), checklist);
    return { engine, task, mapping };
  }

  it('stores trimmed keywords on the plan item', async () => {
    const { mapping } = await setup();
    expect((await mapping.read()).mappings.map((m) => m.plan_items[0]?.keywords)).toEqual([['performance'], ['performance']]);
    expect([...(await mapping.keywordRequirements())]).toEqual([
      ['P-1', ['performance']],
      ['P-2', ['performance']]
    ]);
  });

  it('flags a checked item whose only mention of a keyword is inside code', async () => {
    const { engine, task } = await setup();
    const { report, items } = await engine.audit(task.id);

    expect(items).toEqual({ 'P-1': 'EVID-2025W44-001', 'P-2': 'EVID-2025W44-002' });
    expect(report).toMatchObject({ total: 2, complete_with_evidence: 1, complete_without_evidence: 1, completion_ratio: 0.5 });
    expect(report.hollow.map(describeHollow)).toEqual(['P-1 (line 1): does not mention "performance" outside code']);
  });

  it('feeds the flagged item to the phase predicate and the commit gate', async () => {
    const { engine, task } = await setup();
    const input = await engine.machine.predicateInput(task, 'discovery', 'planning');
    expect(input.audit?.hollow.map((h) => [h.itemId, h.reason])).toEqual([['P-1', 'keyword_unaddressed']]);

    const decision = await engine.gate.handle({ event_type: 'pre_commit', task_id: task.id, staged_paths: ['docs/guide.md'], changed_lines: 10 });
    expect(decision.reasons).toEqual(['Hollow checklist item P-1 (line 1): does not mention "performance" outside code']);
  });
});
