import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { isoWeek, weekBucket } from '../src/core/clock.js';
import { SchemaViolation } from '../src/core/errors.js';
import { EvidenceStore, statusMap } from '../src/core/evidence.js';
import { formatEvidenceId, parseEvidenceId } from '../src/core/evidence-schema.js';
import { commandOutput, fixedClock, silentLog, T0, testResult, tmpDir, type TestClock } from './helpers.js';

async function makeStore(clock: TestClock = fixedClock()) {
  const root = await tmpDir();
  const store = new EvidenceStore({
    root,
    log: silentLog,
    vcs: async () => ({ branch: 'feature/work', commit: 'abc1234' }),
    now: clock,
    freshnessWindowSeconds: 3600
  });
  return { store, root, clock };
}

describe('ISO week buckets', () => {
  it('labels dates by ISO-8601 week', () => {
    expect(weekBucket(Date.parse('2025-10-30T12:00:00Z'))).toBe('2025W44');
    expect(isoWeek(Date.parse('2021-01-01T00:00:00Z'))).toEqual({ year: 2020, week: 53 });
    expect(weekBucket(Date.parse('2024-12-30T08:00:00Z'))).toBe('2025W01');
  });

  it('parses and formats evidence ids', () => {
    expect(parseEvidenceId('EVID-2025W44-007')).toEqual({ bucket: '2025W44', seq: 7 });
    expect(parseEvidenceId('EVID-2025W54-001')).toBeNull();
    expect(parseEvidenceId('EVID-2025W44-000')).toBeNull();
    expect(formatEvidenceId('2025W44', 12)).toBe('EVID-2025W44-012');
  });
});

describe('EvidenceStore', () => {
  it('appends a record and reads it back by id', async () => {
    const { store, root } = await makeStore();
    const rec = await store.append(testResult('task-a', 'CL-1'));

    expect(rec.id).toBe('EVID-2025W44-001');
    expect(rec.timestamp).toBe('2025-10-30T12:00:00.000Z');
    expect(rec.vcs).toEqual({ branch: 'feature/work', commit: 'abc1234' });
    expect(await store.lookup(rec.id)).toEqual(rec);

    const onDisk = JSON.parse(await fs.readFile(path.join(root, '2025W44', 'EVID-2025W44-001.json'), 'utf8'));
    expect(onDisk.checklist_item).toBe('CL-1');
    expect(await store.entries({ taskId: 'task-a' })).toEqual([
      { id: rec.id, type: 'test_result', task_id: 'task-a', checklist_item: 'CL-1', timestamp: rec.timestamp }
    ]);
  });

  it('names the offending field of an invalid record', async () => {
    const { store } = await makeStore();
    const noTests = { ...testResult('task-a', 'CL-1'), tests: undefined };

    const err = await store.append(noTests).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SchemaViolation);
    expect(err).toMatchObject({ code: 'SCHEMA_VIOLATION', field: 'tests', evidenceType: 'test_result' });

    const emptyCommand = commandOutput('task-a', 'CL-1', {
      artifact: { kind: 'command', command: '  ', exit_code: 0, output_sample: 'x' }
    });
    await expect(store.append(emptyCommand)).rejects.toMatchObject({ field: 'artifact.command' });
    expect(await store.entries()).toEqual([]);
  });

  it('copies file artifacts under their content hash', async () => {
    const { store, root } = await makeStore();
    const src = path.join(root, 'report.txt');
    await fs.writeFile(src, 'coverage 91%');

    const rec = await store.append({ type: 'artifact', task_id: 'task-a', checklist_item: 'CL-9', artifact: { kind: 'file', path: src } });
    if (rec.artifact.kind !== 'file') throw new Error('expected a file artifact');
    expect(rec.artifact.size).toBe(12);
    expect(rec.artifact.stored_path).toBe(`2025W44/artifacts/${rec.artifact.sha256}`);
    expect(await fs.readFile(path.join(root, rec.artifact.stored_path), 'utf8')).toBe('coverage 91%');
  });

  it('assigns distinct sequence numbers to concurrent appends from two tasks', async () => {
    const { store } = await makeStore();
    const writes = Array.from({ length: 10 }, (_, i) => store.append(testResult(i % 2 === 0 ? 'task-a' : 'task-b', `CL-${i}`)));
    const records = await Promise.all(writes);

    const ids = records.map((r) => r.id);
    expect(new Set(ids).size).toBe(10);
    expect([...ids].sort()).toEqual(Array.from({ length: 10 }, (_, i) => formatEvidenceId('2025W44', i + 1)));
    expect((await store.entries({ taskId: 'task-a' })).length).toBe(5);
  });

  it('reports freshness against the window', async () => {
    const { store, clock } = await makeStore();
    const rec = await store.append(testResult('task-a', 'CL-1'));

    clock.advance(3600 * 1000);
    expect(store.freshness(rec)).toBe('fresh');
    clock.advance(1000);
    expect(store.ageSeconds(rec)).toBe(3601);
    expect(store.freshness(rec)).toBe('stale');
  });

  it('rejects a timestamp later than the current time', async () => {
    const { store } = await makeStore();
    const err = await store.append(testResult('task-a', 'CL-1', { timestamp: '2025-10-30T13:00:00Z' })).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SchemaViolation);
    expect(err).toMatchObject({ code: 'SCHEMA_VIOLATION', field: 'timestamp' });
    expect(await store.entries()).toEqual([]);
    expect(store.freshness({ timestamp: '2025-10-30T13:00:00.000Z' })).toBe('stale');
  });

  it('files a backdated record under its own week', async () => {
    const { store, root } = await makeStore();
    const rec = await store.append(testResult('task-a', 'CL-1', { timestamp: '2025-10-20T09:00:00Z' }));

    expect(rec.id).toBe('EVID-2025W43-001');
    expect(rec.timestamp).toBe('2025-10-20T09:00:00.000Z');
    expect(store.freshness(rec)).toBe('stale');
    await expect(fs.stat(path.join(root, '2025W43', 'EVID-2025W43-001.json'))).resolves.toBeTruthy();
  });

  it('recovers when a record file exists that the index does not list', async () => {
    const { store, root } = await makeStore();
    const first = await store.append(testResult('task-a', 'CL-1'));
    // a record written before its index update was lost
    const orphan = { ...first, id: 'EVID-2025W44-002', checklist_item: 'CL-2' };
    await fs.writeFile(path.join(root, '2025W44', 'EVID-2025W44-002.json'), JSON.stringify(orphan));

    const next = await store.append(testResult('task-a', 'CL-3'));
    expect(next.id).toBe('EVID-2025W44-003');
    expect((await store.entries()).map((e) => [e.id, e.checklist_item])).toEqual([
      ['EVID-2025W44-001', 'CL-1'],
      ['EVID-2025W44-002', 'CL-2'],
      ['EVID-2025W44-003', 'CL-3']
    ]);
    expect((await store.append(testResult('task-a', 'CL-4'))).id).toBe('EVID-2025W44-004');
  });
});

describe('validateChecklist', () => {
  it('marks a checked item with a resolvable reference as backed by evidence', async () => {
    const { store } = await makeStore();
    await store.append(testResult('task-a', 'line-1'));

    const results = await store.validateChecklist('- [x] Implement rate limiter <!-- evidence: EVID-2025W44-001 -->');
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      itemId: 'line-1',
      status: 'EVIDENCE',
      evidenceId: 'EVID-2025W44-001',
      evidenceType: 'test_result'
    });
  });

  it('reports MISSING when the reference sits outside the lookahead window', async () => {
    const { store } = await makeStore();
    await store.append(testResult('task-a', 'line-1'));
    const text = ['- [x] Implement rate limiter', '', '', '', '', '', '', '<!-- evidence: EVID-2025W44-001 -->'].join('\n');

    const [result] = await store.validateChecklist(text);
    expect(result?.status).toBe('MISSING');
    expect(result?.reason).toBe('no evidence reference within 5 lines of line 1');
  });

  it('separates malformed from unresolved ids and skips unchecked items', async () => {
    const { store } = await makeStore();
    const text = [
      '- [x] A-1: bad id <!-- evidence: EVID-1 -->',
      '- [x] A-2: unknown <!-- evidence: EVID-2025W44-050 -->',
      '- [ ] A-3: pending'
    ].join('\n');

    const results = await store.validateChecklist(text);
    expect(results.map((r) => r.status)).toEqual(['INVALID', 'INVALID', 'INCOMPLETE']);
    expect(results[0]?.reason).toBe("malformed evidence id 'EVID-1'");
    expect(results[1]?.reason).toBe('evidence EVID-2025W44-050 does not resolve');
    expect(statusMap(results)).toEqual({ 'A-1': 'INVALID', 'A-2': 'INVALID' });
  });

  it('reports an unreadable record as INVALID instead of failing the whole checklist', async () => {
    const { store, root } = await makeStore();
    await store.append(testResult('task-a', 'A-1'));
    await store.append(testResult('task-a', 'A-2'));
    await fs.writeFile(path.join(root, '2025W44', 'EVID-2025W44-001.json'), '{ truncated');
    const text = ['- [x] A-1: done <!-- evidence: EVID-2025W44-001 -->', '- [x] A-2: done <!-- evidence: EVID-2025W44-002 -->'].join('\n');

    const results = await store.validateChecklist(text);
    expect(results.map((r) => r.status)).toEqual(['INVALID', 'EVIDENCE']);
    expect(results[0]?.reason).toMatch(/^evidence EVID-2025W44-001 is unreadable: /);
  });

  it('rejects evidence recorded for another task', async () => {
    const { store } = await makeStore();
    await store.append(testResult('task-a', 'A-1'));
    const text = '- [x] A-1: done <!-- evidence: EVID-2025W44-001 -->';

    const [theirs] = await store.validateChecklist(text, { taskId: 'task-b' });
    expect(theirs).toMatchObject({ status: 'INVALID', evidenceId: 'EVID-2025W44-001', reason: 'evidence EVID-2025W44-001 belongs to task task-a' });
    const [own] = await store.validateChecklist(text, { taskId: 'task-a' });
    expect(own?.status).toBe('EVIDENCE');
  });

  it('gives the same answer on repeated calls', async () => {
    const { store } = await makeStore();
    await store.append(testResult('task-a', 'A-1'));
    const text = '- [x] A-1: done <!-- evidence: EVID-2025W44-001 -->';
    expect(await store.validateChecklist(text)).toEqual(await store.validateChecklist(text));
  });
});

describe('clock fixture', () => {
  it('starts on a Thursday in week 44', () => {
    expect(new Date(T0).getUTCDay()).toBe(4);
  });
});
