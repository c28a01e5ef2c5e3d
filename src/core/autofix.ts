import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { LedgerDb } from '../infra/db.js';
import type { CommandRunner } from '../infra/exec.js';
import { systemClock, type Clock } from './clock.js';
import type { FixPatternConfig, Policy } from './config.js';
import { errorMessage, SchemaViolation } from './errors.js';
import type { Snapshot, Snapshotter } from './snapshots.js';
import type { EventSink } from './types.js';

export type Tier = 'tier1' | 'tier2' | 'tier3';
export type Risk = FixPatternConfig['risk'];
export type FixPattern = FixPatternConfig;

export type AutoFixEventKind = 'detected' | 'attempt' | 'success' | 'rollback' | 'escalated' | 'deferred';

export const BUILTIN_PATTERNS: FixPattern[] = [
  {
    id: 'missing-dependency',
    match: "Cannot find (?:module|package) '([^'./][^']*)'",
    risk: 'low',
    description: 'Install a dependency the code imports but the manifest lacks',
    commands: [['npm', 'install', '$1']]
  },
  {
    id: 'formatting',
    match: 'Code style issues found|Run Prettier to fix|prettier --check',
    risk: 'low',
    description: 'Rewrite files with the project formatter',
    commands: [['npx', 'prettier', '--write', '.']]
  },
  {
    id: 'lint-autofix',
    match: 'potentially fixable with the `--fix` option',
    risk: 'medium',
    description: 'Apply the linter auto-fixes',
    commands: [
      ['npx', 'eslint', '--fix', '.'],
      ['npx', 'eslint', '--fix', '--no-cache', '.']
    ]
  },
  {
    id: 'lockfile-drift',
    match: 'package\\.json and package-lock\\.json .*(?:not in sync|out of sync)|npm ci` can only install packages',
    risk: 'low',
    description: 'Regenerate the lock file from the manifest',
    commands: [
      ['npm', 'install', '--package-lock-only'],
      ['npm', 'install']
    ]
  },
  {
    id: 'stale-build',
    match: "ERR_MODULE_NOT_FOUND.*[/\\\\]dist[/\\\\]|Cannot find module '[./][^']*[/\\\\]dist[/\\\\]",
    risk: 'medium',
    description: 'Rebuild compiled output that is missing or out of date',
    commands: [['npm', 'run', 'build']]
  },
  {
    id: 'data-migration',
    match: '(?:pending|failed|required) migrations?|migration (?:pending|failed|required)',
    risk: 'high',
    description: 'Run pending data migrations',
    commands: [['npm', 'run', 'migrate']]
  },
  {
    id: 'security-sensitive',
    match: 'vulnerabilit(?:y|ies)|CVE-\\d{4}-\\d+|npm audit',
    risk: 'high',
    description: 'Apply dependency security fixes',
    commands: [['npm', 'audit', 'fix']]
  }
];

export type AutoFixPolicy = Policy['auto_fix'];

/**
 * High-risk patterns and low confidence always need a human; only
 * low-risk patterns at or above the tier1 minimum run unattended.
 */
export function classify(confidence: number, pattern: Pick<FixPattern, 'risk'>, policy: AutoFixPolicy): Tier {
  const [tier2Min] = policy.tier2.confidence_range;
  if (pattern.risk === 'high' || confidence < tier2Min) return 'tier3';
  if (confidence >= policy.tier1.confidence_min && pattern.risk === 'low') return 'tier1';
  return 'tier2';
}

/** `$1`, `$2`… in a command are replaced by the pattern's capture groups. */
export function expandCommand(cmd: string[], captures: (string | undefined)[]): string[] {
  return cmd.map((arg) => arg.replace(/\$(\d)/g, (_, n: string) => captures[Number(n)] ?? ''));
}

export interface PatternMatch {
  pattern: FixPattern;
  captures: (string | undefined)[];
}

export function matchPattern(signature: string, patterns: FixPattern[]): PatternMatch | null {
  for (const pattern of patterns) {
    const m = new RegExp(pattern.match, 'i').exec(signature);
    if (m) return { pattern, captures: [...m] };
  }
  return null;
}

export interface AttemptResult {
  command: string[];
  snapshotId: string;
  ok: boolean;
  exitCode: number;
  reason?: string;
}

export type FixStatus = 'applied' | 'rolled_back' | 'escalated' | 'needs_confirmation' | 'no_match';

export interface FixResult {
  status: FixStatus;
  signature: string;
  confidence: number;
  patternId?: string;
  tier?: Tier;
  attempts: AttemptResult[];
  reason?: string;
}

export interface AutoFixEvent {
  id: string;
  signature: string;
  patternId: string | null;
  tier: Tier | null;
  kind: AutoFixEventKind;
  snapshotId: string | null;
  reason: string | null;
  createdAt: number;
}

interface AutoFixEventRow {
  id: string;
  signature: string;
  pattern_id: string | null;
  tier: Tier | null;
  kind: AutoFixEventKind;
  snapshot_id: string | null;
  reason: string | null;
  created_at: number;
}

const MAX_SIGNATURE_CHARS = 500;
const MAX_REASON_CHARS = 1000;

/** The auto-fix log in the ledger; read back by the KPI reporter. */
export class AutoFixLog {
  constructor(private db: LedgerDb) {}

  record(evt: Omit<AutoFixEvent, 'id'>): AutoFixEvent {
    const row: AutoFixEvent = { id: nanoid(12), ...evt };
    this.db
      .prepare(
        'INSERT INTO autofix_events (id, signature, pattern_id, tier, kind, snapshot_id, reason, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?)'
      )
      .run(row.id, row.signature, row.patternId, row.tier, row.kind, row.snapshotId, row.reason, row.createdAt);
    return row;
  }

  /** Events with `since <= created_at < until`, oldest first. */
  events(range: { since?: number; until?: number } = {}): AutoFixEvent[] {
    const rows = this.db
      .prepare(
        'SELECT id, signature, pattern_id, tier, kind, snapshot_id, reason, created_at FROM autofix_events WHERE created_at >= ? AND created_at < ? ORDER BY created_at ASC, rowid ASC'
      )
      .all(range.since ?? 0, range.until ?? Number.MAX_SAFE_INTEGER) as AutoFixEventRow[];
    return rows.map((r) => ({
      id: r.id,
      signature: r.signature,
      patternId: r.pattern_id,
      tier: r.tier,
      kind: r.kind,
      snapshotId: r.snapshot_id,
      reason: r.reason,
      createdAt: r.created_at
    }));
  }
}

export interface AutoFixEngineOptions {
  root: string;
  runner: CommandRunner;
  snapshotter: Snapshotter;
  log: Logger;
  policy: AutoFixPolicy;
  ledger: AutoFixLog;
  now?: Clock;
  onEvent?: EventSink;
}

export interface ApplyOptions {
  /** Human confirmation for a tier3 fix. */
  confirmed?: boolean;
  /** Command whose success confirms the fix, e.g. the failing test run. */
  verify?: string[];
}

function tail(text: string, max = 300): string {
  const t = text.trim();
  return t.length <= max ? t : `…${t.slice(t.length - max)}`;
}

export class AutoFixEngine {
  private now: Clock;
  readonly patterns: FixPattern[];

  constructor(private opts: AutoFixEngineOptions) {
    this.now = opts.now ?? systemClock;
    this.patterns = [...BUILTIN_PATTERNS, ...opts.policy.patterns];
  }

  private record(kind: AutoFixEventKind, signature: string, extra: Partial<Pick<AutoFixEvent, 'patternId' | 'tier' | 'snapshotId' | 'reason'>> = {}) {
    return this.opts.ledger.record({
      signature,
      kind,
      patternId: extra.patternId ?? null,
      tier: extra.tier ?? null,
      snapshotId: extra.snapshotId ?? null,
      reason: extra.reason ? extra.reason.slice(0, MAX_REASON_CHARS) : null,
      createdAt: this.now()
    });
  }

  classify(confidence: number, pattern: Pick<FixPattern, 'risk'>): Tier {
    return classify(confidence, pattern, this.opts.policy);
  }

  async apply(errorSignature: string, confidence: number, opts: ApplyOptions = {}): Promise<FixResult> {
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw new SchemaViolation('confidence', 'must be a number between 0 and 1');
    }
    const signature = errorSignature.trim().slice(0, MAX_SIGNATURE_CHARS);
    if (!signature) throw new SchemaViolation('error_signature', 'must be a non-empty string');

    this.record('detected', signature);
    const match = matchPattern(signature, this.patterns);
    if (!match) {
      return this.finish({ status: 'no_match', signature, confidence, attempts: [], reason: 'no fix pattern matches this error' });
    }

    const { pattern } = match;
    const tier = this.classify(confidence, pattern);
    const base = { signature, confidence, patternId: pattern.id, tier };
    const ctx = { patternId: pattern.id, tier };
    const commands = pattern.commands.map((c) => expandCommand(c, match.captures));

    if (commands.length === 0) {
      this.record('escalated', signature, { ...ctx, reason: 'pattern has no remediation commands' });
      return this.finish({ ...base, status: 'escalated', attempts: [], reason: 'pattern has no remediation commands' });
    }

    const mustConfirm = tier === 'tier3' && this.opts.policy.tier3.always_confirm;
    if (mustConfirm && !opts.confirmed) {
      const reason = pattern.risk === 'high' ? `${pattern.id} is a high-risk fix` : `confidence ${confidence} is below the auto-fix range`;
      this.record('deferred', signature, { ...ctx, reason });
      return this.finish({ ...base, status: 'needs_confirmation', attempts: [], reason });
    }

    // tier2, and tier3 without mandatory confirmation, work through the bounded command list
    const tryAll = tier === 'tier2' || (tier === 'tier3' && !mustConfirm);
    const budget = tryAll ? Math.min(commands.length, this.opts.policy.tier2.max_attempts) : 1;

    const attempts: AttemptResult[] = [];
    for (const command of commands.slice(0, budget)) {
      let snapshot: Snapshot;
      try {
        snapshot = await this.opts.snapshotter.create(`${pattern.id}: ${command.join(' ')}`);
      } catch (err) {
        const reason = `snapshot failed, fix not applied: ${errorMessage(err)}`;
        this.opts.log.error({ err, signature, patternId: pattern.id }, 'autofix.snapshot_failed');
        this.record('escalated', signature, { ...ctx, reason });
        return this.finish({ ...base, status: 'escalated', attempts, reason });
      }

      const attempt = await this.attempt(command, snapshot, signature, ctx, opts.verify);
      attempts.push(attempt);
      if (attempt.ok) return this.finish({ ...base, status: 'applied', attempts });
    }

    if (!tryAll) {
      return this.finish({ ...base, status: 'rolled_back', attempts, reason: attempts[attempts.length - 1]?.reason });
    }
    const reason = `${attempts.length} remediation attempt(s) failed; needs a human decision`;
    this.record('escalated', signature, { ...ctx, reason });
    return this.finish({ ...base, status: 'escalated', attempts, reason });
  }

  private async attempt(
    command: string[],
    snapshot: Snapshot,
    signature: string,
    ctx: { patternId: string; tier: Tier },
    verify?: string[]
  ): Promise<AttemptResult> {
    this.record('attempt', signature, { ...ctx, snapshotId: snapshot.id, reason: command.join(' ') });

    // -1 when the command never reported an exit code
    let exitCode = -1;
    let failure: string;
    try {
      let res = await this.opts.runner.run(command, { cwd: this.opts.root });
      exitCode = res.exitCode;
      let failed = res.ok ? null : `${command.join(' ')} exited ${res.exitCode}: ${tail(res.output)}`;
      if (res.ok && verify && verify.length > 0) {
        res = await this.opts.runner.run(verify, { cwd: this.opts.root });
        exitCode = res.exitCode;
        if (!res.ok) failed = `verification ${verify.join(' ')} exited ${res.exitCode}: ${tail(res.output)}`;
      }
      if (failed === null) {
        await this.opts.snapshotter.discard(snapshot);
        this.record('success', signature, { ...ctx, snapshotId: snapshot.id });
        this.opts.log.info({ signature, patternId: ctx.patternId, tier: ctx.tier, command }, 'autofix.applied');
        return { command, snapshotId: snapshot.id, ok: true, exitCode };
      }
      failure = failed;
    } catch (err) {
      failure = `${command.join(' ')} failed: ${errorMessage(err)}`;
      this.opts.log.error({ err, signature, patternId: ctx.patternId, snapshotId: snapshot.id }, 'autofix.attempt_failed');
    }

    try {
      await this.opts.snapshotter.restore(snapshot);
    } catch (err) {
      failure = `${failure}; restoring snapshot ${snapshot.id} failed: ${errorMessage(err)}`;
      this.opts.log.error({ err, signature, snapshotId: snapshot.id }, 'autofix.restore_failed');
    }
    this.record('rollback', signature, { ...ctx, snapshotId: snapshot.id, reason: failure });
    this.opts.log.warn({ signature, patternId: ctx.patternId, snapshotId: snapshot.id, reason: failure }, 'autofix.rollback');
    return { command, snapshotId: snapshot.id, ok: false, exitCode, reason: failure };
  }

  private finish(result: FixResult): FixResult {
    this.opts.onEvent?.({
      type: 'autofix.result',
      signature: result.signature,
      status: result.status,
      tier: result.tier ?? 'none',
      ts: this.now()
    });
    return result;
  }
}
