import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { parsePolicy, type Policy } from '../src/core/config.js';
import { Engine } from '../src/core/engine.js';
import type { Snapshotter } from '../src/core/snapshots.js';
import { openDb } from '../src/infra/db.js';
import type { CommandRunner, ExecResult } from '../src/infra/exec.js';

export const T0 = Date.parse('2025-10-30T12:00:00Z');
export const SIGNING_KEY = 'test-secret-key-0001';

export const silentLog = pino({ level: 'silent' });

export interface TestClock {
  (): number;
  set(ms: number): void;
  advance(ms: number): void;
}

export function fixedClock(start = T0): TestClock {
  let t = start;
  const clock = () => t;
  clock.set = (ms: number) => {
    t = ms;
  };
  clock.advance = (ms: number) => {
    t += ms;
  };
  return clock;
}

export async function tmpDir(prefix = 'phasegate-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function execResult(ok: boolean, stdout = '', exitCode = ok ? 0 : 1): ExecResult {
  return { ok, exitCode, stdout, stderr: '', output: stdout, missing: false };
}

type Responder = (cmd: string[]) => ExecResult | undefined;

/** Records every command; answers git queries for branch `feature/work` unless a responder says otherwise. */
export class FakeRunner implements CommandRunner {
  readonly calls: string[][] = [];

  constructor(private responder: Responder = () => undefined) {}

  async run(cmd: string[]): Promise<ExecResult> {
    this.calls.push(cmd);
    const answer = this.responder(cmd);
    if (answer) return answer;
    const line = cmd.join(' ');
    if (line === 'git rev-parse --abbrev-ref HEAD') return execResult(true, 'feature/work\n');
    if (line === 'git rev-parse --short HEAD') return execResult(true, 'abc1234\n');
    if (line === 'git diff --cached --numstat') return execResult(true, '');
    return execResult(true);
  }

  /** Calls other than git queries. */
  commands(): string[] {
    return this.calls.filter((c) => c[0] !== 'git').map((c) => c.join(' '));
  }
}

export interface TestEngine {
  engine: Engine;
  root: string;
  clock: TestClock;
  runner: FakeRunner;
}

export async function makeEngine(
  opts: { policy?: unknown; runner?: FakeRunner; signingKey?: string | null; snapshotter?: Snapshotter; clock?: TestClock } = {}
): Promise<TestEngine> {
  const root = await tmpDir();
  const clock = opts.clock ?? fixedClock();
  const runner = opts.runner ?? new FakeRunner();
  let seq = 0;
  const policy: Policy = parsePolicy(opts.policy ?? {});
  const engine = new Engine({
    paths: { repoRoot: root, stateDir: path.join(root, '.phasegate'), dbPath: ':memory:' },
    policy,
    log: silentLog,
    signingKey: opts.signingKey === null ? undefined : (opts.signingKey ?? SIGNING_KEY),
    runner,
    snapshotter: opts.snapshotter,
    now: clock,
    idSuffix: () => `s${String(++seq).padStart(5, '0')}`,
    db: openDb(':memory:')
  });
  return { engine, root, clock, runner };
}

export function testResult(taskId: string, item: string, extra: Record<string, unknown> = {}) {
  return {
    type: 'test_result',
    task_id: taskId,
    checklist_item: item,
    artifact: { kind: 'command', command: 'npm test', exit_code: 0, output_sample: '12 passed' },
    tests: { passed: 12, failed: 0 },
    ...extra
  };
}

export function commandOutput(taskId: string, item: string, extra: Record<string, unknown> = {}) {
  return {
    type: 'command_output',
    task_id: taskId,
    checklist_item: item,
    artifact: { kind: 'command', command: 'npm run build', exit_code: 0, output_sample: 'built' },
    ...extra
  };
}

export function codeReview(taskId: string, item: string) {
  return {
    type: 'code_review',
    task_id: taskId,
    checklist_item: item,
    reviewer: 'reviewer-agent',
    verdict: 'approved',
    artifact: { kind: 'command', command: 'git diff main', exit_code: 0, output_sample: 'diff reviewed' }
  };
}

export async function writeFile(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
}
