import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { AutoFixEngine, AutoFixLog, classify, expandCommand, matchPattern, BUILTIN_PATTERNS } from '../src/core/autofix.js';
import { parsePolicy } from '../src/core/config.js';
import { SchemaViolation } from '../src/core/errors.js';
import { FileSnapshotter, type Snapshot, type Snapshotter } from '../src/core/snapshots.js';
import { openDb } from '../src/infra/db.js';
import { execResult, FakeRunner, fixedClock, silentLog, tmpDir } from './helpers.js';

class RecordingSnapshotter implements Snapshotter {
  readonly created: string[] = [];
  readonly restored: string[] = [];
  readonly discarded: string[] = [];

  constructor(private inner: Snapshotter) {}

  async create(action: string): Promise<Snapshot> {
    const s = await this.inner.create(action);
    this.created.push(s.id);
    return s;
  }

  async restore(snapshot: Snapshot): Promise<Snapshot> {
    this.restored.push(snapshot.id);
    return this.inner.restore(snapshot);
  }

  async discard(snapshot: Snapshot): Promise<void> {
    this.discarded.push(snapshot.id);
    await this.inner.discard(snapshot);
  }

  list(): Promise<Snapshot[]> {
    return this.inner.list();
  }
}

async function setup(opts: { runner?: FakeRunner; policy?: unknown } = {}) {
  const root = await tmpDir();
  fs.writeFileSync(path.join(root, 'package.json'), '{"name":"app"}\n');
  const clock = fixedClock();
  const snapshots = new RecordingSnapshotter(
    new FileSnapshotter({ root, dir: path.join(root, '.phasegate', 'snapshots'), paths: ['package.json'], log: silentLog, now: clock })
  );
  const runner = opts.runner ?? new FakeRunner();
  const ledger = new AutoFixLog(openDb(':memory:'));
  const engine = new AutoFixEngine({
    root,
    runner,
    snapshotter: snapshots,
    log: silentLog,
    policy: parsePolicy(opts.policy ?? {}).auto_fix,
    ledger,
    now: clock
  });
  return { root, runner, snapshots, ledger, engine };
}

const kinds = (ledger: AutoFixLog) => ledger.events().map((e) => e.kind);

describe('fix classification', () => {
  const policy = parsePolicy({}).auto_fix;

  it('assigns tiers by confidence and risk', () => {
    expect(classify(0.97, { risk: 'low' }, policy)).toBe('tier1');
    expect(classify(0.95, { risk: 'low' }, policy)).toBe('tier1');
    expect(classify(0.97, { risk: 'medium' }, policy)).toBe('tier2');
    expect(classify(0.8, { risk: 'low' }, policy)).toBe('tier2');
    expect(classify(0.69, { risk: 'low' }, policy)).toBe('tier3');
    expect(classify(0.99, { risk: 'high' }, policy)).toBe('tier3');
  });

  it('matches known errors and expands captures into the command', () => {
    const match = matchPattern("Error: Cannot find module 'left-pad'", BUILTIN_PATTERNS);
    expect(match?.pattern.id).toBe('missing-dependency');
    expect(expandCommand(['npm', 'install', '$1'], match?.captures ?? [])).toEqual(['npm', 'install', 'left-pad']);
    expect(matchPattern("Cannot find module './local'", BUILTIN_PATTERNS)).toBeNull();
  });
});

describe('AutoFixEngine', () => {
  it('applies a tier1 fix unattended, snapshotting first and discarding on success', async () => {
    const { engine, runner, snapshots, ledger } = await setup();
    const result = await engine.apply("Error: Cannot find module 'left-pad'", 0.97);

    expect(result).toMatchObject({ status: 'applied', tier: 'tier1', patternId: 'missing-dependency' });
    expect(runner.commands()).toEqual(['npm install left-pad']);
    expect(snapshots.created).toHaveLength(1);
    expect(snapshots.discarded).toEqual(snapshots.created);
    expect(await snapshots.list()).toEqual([]);
    expect(kinds(ledger)).toEqual(['detected', 'attempt', 'success']);
  });

  it('restores the snapshot when the fix fails', async () => {
    const runner = new FakeRunner((cmd) => {
      if (cmd[0] !== 'npm') return undefined;
      fs.writeFileSync(path.join(root, 'package.json'), 'broken');
      return execResult(false, 'npm ERR! 404');
    });
    const { engine, snapshots, ledger, root } = await setup({ runner });

    const result = await engine.apply("Cannot find module 'left-pad'", 0.99);
    expect(result.status).toBe('rolled_back');
    expect(result.reason).toBe('npm install left-pad exited 1: npm ERR! 404');
    expect(fs.readFileSync(path.join(root, 'package.json'), 'utf8')).toBe('{"name":"app"}\n');
    expect(snapshots.restored).toEqual(snapshots.created);
    expect((await snapshots.list()).map((s) => s.status)).toEqual(['restored']);
    expect(kinds(ledger)).toEqual(['detected', 'attempt', 'rollback']);
  });

  it('restores the snapshot when the fix command throws', async () => {
    const runner = new FakeRunner((cmd) => {
      if (cmd[0] !== 'npm') return undefined;
      fs.writeFileSync(path.join(root, 'package.json'), 'broken');
      throw new Error('spawn npm ENOMEM');
    });
    const { engine, snapshots, ledger, root } = await setup({ runner });

    const result = await engine.apply("Cannot find module 'left-pad'", 0.99);
    expect(result.status).toBe('rolled_back');
    expect(result.reason).toBe('npm install left-pad failed: spawn npm ENOMEM');
    expect(result.attempts[0]).toMatchObject({ ok: false, exitCode: -1 });
    expect(fs.readFileSync(path.join(root, 'package.json'), 'utf8')).toBe('{"name":"app"}\n');
    expect(snapshots.restored).toEqual(snapshots.created);
    expect(kinds(ledger)).toEqual(['detected', 'attempt', 'rollback']);
    expect(ledger.events().at(-1)?.reason).toBe('npm install left-pad failed: spawn npm ENOMEM');
  });

  it('rolls back when the verification command fails', async () => {
    const runner = new FakeRunner((cmd) => (cmd.join(' ') === 'npm test' ? execResult(false) : undefined));
    const { engine } = await setup({ runner });

    const result = await engine.apply("Cannot find module 'left-pad'", 0.99, { verify: ['npm', 'test'] });
    expect(result.status).toBe('rolled_back');
    expect(result.attempts[0]?.reason).toBe('verification npm test exited 1: ');
  });

  it('works through tier2 candidates and escalates when all fail', async () => {
    const runner = new FakeRunner((cmd) => (cmd[0] === 'npx' ? execResult(false, 'still failing') : undefined));
    const { engine, snapshots, ledger } = await setup({ runner });

    const result = await engine.apply('2 errors potentially fixable with the `--fix` option.', 0.97);
    expect(result).toMatchObject({
      status: 'escalated',
      tier: 'tier2',
      reason: '2 remediation attempt(s) failed; needs a human decision'
    });
    expect(runner.commands()).toEqual(['npx eslint --fix .', 'npx eslint --fix --no-cache .']);
    expect(snapshots.created).toHaveLength(2);
    expect(kinds(ledger)).toEqual(['detected', 'attempt', 'rollback', 'attempt', 'rollback', 'escalated']);
  });

  it('defers tier3 fixes until confirmed', async () => {
    const { engine, runner, snapshots, ledger } = await setup();

    const deferred = await engine.apply('npm audit reports 3 high severity vulnerabilities', 0.99);
    expect(deferred).toMatchObject({ status: 'needs_confirmation', tier: 'tier3', reason: 'security-sensitive is a high-risk fix' });
    expect(runner.commands()).toEqual([]);
    expect(snapshots.created).toEqual([]);

    const low = await engine.apply("Cannot find module 'left-pad'", 0.5);
    expect(low.reason).toBe('confidence 0.5 is below the auto-fix range');

    const confirmed = await engine.apply('npm audit reports 3 high severity vulnerabilities', 0.99, { confirmed: true });
    expect(confirmed.status).toBe('applied');
    expect(runner.commands()).toEqual(['npm audit fix']);
    expect(kinds(ledger)).toEqual(['detected', 'deferred', 'detected', 'deferred', 'detected', 'attempt', 'success']);
  });

  it('uses patterns from the policy and reports unknown errors', async () => {
    const { engine, runner } = await setup({
      policy: { auto_fix: { patterns: [{ id: 'cache-clear', match: 'EINTEGRITY', risk: 'low', commands: [['npm', 'cache', 'clean', '--force']] }] } }
    });

    expect((await engine.apply('npm ERR! code EINTEGRITY', 0.99)).patternId).toBe('cache-clear');
    expect(runner.commands()).toEqual(['npm cache clean --force']);
    expect((await engine.apply('Segmentation fault', 0.99)).status).toBe('no_match');
    await expect(engine.apply('', 0.99)).rejects.toBeInstanceOf(SchemaViolation);
    await expect(engine.apply('x', 1.5)).rejects.toMatchObject({ field: 'confidence' });
  });
});
