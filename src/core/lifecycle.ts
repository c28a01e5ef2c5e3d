import fs from 'node:fs/promises';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { LedgerDb } from '../infra/db.js';
import { pathExists, toRelPosix } from '../infra/files.js';
import type { GitProbe } from '../infra/git.js';
import { systemClock, type Clock } from './clock.js';
import type { Policy } from './config.js';
import { errorMessage, isPhaseGateError, SchemaViolation, StaleEvidence } from './errors.js';
import type { EvidenceStore } from './evidence.js';
import { matchesAny } from './glob.js';
import { describeHollow, type MappingStore } from './mapping.js';
import { nextPhase, PHASES, phaseAllows, phaseDefinition, phaseLabel, type Phase } from './phases.js';
import { checklistPathFor, type PhaseMachine } from './state-machine.js';
import { currentPhase, type TaskNamespace } from './tasks.js';
import type { EventSink, LifecycleDecision, Task, UnmetCondition } from './types.js';

export const LifecycleEventSchema = z.object({
  event_type: z.enum(['pre_mutation', 'pre_commit', 'pre_push', 'phase_advance']),
  tool_name: z.string().default('unknown'),
  staged_paths: z.array(z.string().min(1)).default([]),
  current_phase: z.enum(PHASES).optional(),
  task_id: z.string().min(1).optional(),
  changed_lines: z.number().int().min(0).optional()
});

export type LifecycleEvent = z.infer<typeof LifecycleEventSchema>;

export function parseLifecycleEvent(raw: unknown): LifecycleEvent {
  const parsed = LifecycleEventSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SchemaViolation(issue && issue.path.length > 0 ? issue.path.join('.') : 'event', issue?.message ?? 'invalid event');
  }
  return parsed.data;
}

/** One line per unmet condition: message, listed items, then the remediation. */
export function formatUnmet(u: UnmetCondition): string {
  const items = u.items && u.items.length > 0 ? `: ${u.items.join(', ')}` : '';
  const fix = u.remediation ? ` (${u.remediation})` : '';
  return `${u.message}${items}${fix}`;
}

export interface LifecycleGateOptions {
  repoRoot: string;
  stateDir: string;
  tasks: TaskNamespace;
  evidence: EvidenceStore;
  mappingFor: (taskDir: string) => MappingStore;
  machine: PhaseMachine;
  git: GitProbe;
  policy: Policy;
  log: Logger;
  now?: Clock;
  onEvent?: EventSink;
}

interface Findings {
  reasons: string[];
  warnings: string[];
}

/**
 * Entry point for the host tool's lifecycle events. Resolves the task the
 * event names, runs the checks for the event type and applies the
 * enforcement mode to the result.
 */
export class LifecycleGate {
  private now: Clock;

  constructor(private db: LedgerDb, private opts: LifecycleGateOptions) {
    this.now = opts.now ?? systemClock;
  }

  async handle(raw: unknown): Promise<LifecycleDecision> {
    const event = parseLifecycleEvent(raw);
    const mode = this.opts.policy.enforcement.mode;
    if (mode === 'disabled') return this.decide(event, { allow: true, reasons: [], warnings: [] });

    const findings: Findings = { reasons: [], warnings: [] };
    const task = await this.resolveTask(event, findings);
    if (task) {
      const phase = currentPhase(task);
      if (event.current_phase && event.current_phase !== phase) {
        findings.reasons.push(`Event reports ${phaseLabel(event.current_phase)} but task ${task.id} is in ${phaseLabel(phase)}`);
      } else {
        await this.check(event, task, phase, findings);
      }
    }

    const blocked = findings.reasons.length > 0;
    return this.decide(event, {
      allow: mode === 'advisory' || !blocked,
      reasons: findings.reasons,
      warnings: findings.warnings
    });
  }

  private async resolveTask(event: LifecycleEvent, findings: Findings): Promise<Task | null> {
    if (!event.task_id) {
      findings.reasons.push('No active task: create a task first (phasegate task create <slug>)');
      return null;
    }
    try {
      const task = await this.opts.tasks.resolve(event.task_id);
      if (task.archived_at) {
        findings.reasons.push(`Task ${task.id} is archived; create a new task for further work`);
        return null;
      }
      return task;
    } catch (err) {
      if (!isPhaseGateError(err)) throw err;
      findings.reasons.push(err.remediation ? `${err.message} (${err.remediation})` : err.message);
      return null;
    }
  }

  private async check(event: LifecycleEvent, task: Task, phase: Phase, findings: Findings): Promise<void> {
    switch (event.event_type) {
      case 'pre_mutation':
        await this.checkMutation(event, task, phase, findings);
        return;
      case 'pre_commit':
        await this.checkMutation(event, task, phase, findings);
        await this.checkCommit(event, task, phase, findings);
        return;
      case 'pre_push': {
        const verification = await this.opts.machine.verifyReceipts(task.id);
        findings.reasons.push(...verification.problems);
        return;
      }
      case 'phase_advance': {
        const to = nextPhase(phase);
        if (to === null) {
          findings.reasons.push(`${phaseLabel(phase)} is the terminal phase`);
          return;
        }
        const result = await this.opts.machine.attemptAdvance(task.id, phase, to);
        findings.warnings.push(...result.warnings);
        if (!result.ok) findings.reasons.push(...result.unmet.map(formatUnmet));
        return;
      }
    }
  }

  private async checkMutation(event: LifecycleEvent, task: Task, phase: Phase, findings: Findings): Promise<void> {
    const stateRel = toRelPosix(this.opts.repoRoot, this.opts.stateDir);
    for (const p of event.staged_paths) {
      const rel = toRelPosix(this.opts.repoRoot, p);
      if (rel === stateRel || rel.startsWith(`${stateRel}/`)) continue;
      if (rel.startsWith('../')) {
        findings.reasons.push(`${p} is outside the repository`);
        continue;
      }
      if (!phaseAllows(phase, rel)) {
        findings.reasons.push(`${rel} may not be modified in ${phaseLabel(phase)}`);
      }
      if (task.lane === 'fast' && !matchesAny(rel, this.opts.policy.lanes.fast.allowed_paths)) {
        findings.reasons.push(`${rel} is outside the fast lane's allowed paths`);
      }
    }

    if (event.staged_paths.length === 0 && event.event_type === 'pre_mutation') return;
    const branch = await this.opts.git.currentBranch();
    if (branch === null) {
      findings.warnings.push('Current branch unknown; protected-branch check skipped');
    } else if (this.opts.policy.git.protected_branches.includes(branch)) {
      findings.reasons.push(`Branch ${branch} is protected; work on a feature branch`);
    }
  }

  private async checkCommit(event: LifecycleEvent, task: Task, phase: Phase, findings: Findings): Promise<void> {
    if (task.lane === 'fast') {
      const max = this.opts.policy.lanes.fast.max_lines;
      const lines = event.changed_lines ?? (await this.opts.git.stagedLineCount());
      if (lines === null) {
        findings.warnings.push('Staged line count unavailable; fast-lane size check skipped');
      } else if (lines > max) {
        findings.reasons.push(`Fast lane allows ${max} changed lines, staged change has ${lines} (move the task to the full lane)`);
      }
    }

    const dir = await this.opts.tasks.taskDir(task.id);
    const mapping = this.opts.mappingFor(dir);
    const checklistFile = await checklistPathFor(dir, mapping);
    if (!(await pathExists(checklistFile))) return;

    const text = await fs.readFile(checklistFile, 'utf8');
    const results = await this.opts.evidence.validateChecklist(text, { taskId: task.id });
    const audit = await mapping.report(text, results);
    for (const h of audit.hollow) findings.reasons.push(`Hollow checklist item ${describeHollow(h)}`);

    const fresh = phaseDefinition(phase).freshEvidence;
    const nowMs = this.now();
    for (const r of results) {
      if (r.status !== 'EVIDENCE' || !r.evidenceId || !r.evidenceType || !r.evidenceTimestamp) continue;
      if (this.opts.evidence.freshness({ timestamp: r.evidenceTimestamp }, nowMs) === 'fresh') continue;
      const stale = new StaleEvidence(r.evidenceId, this.opts.evidence.ageSeconds({ timestamp: r.evidenceTimestamp }, nowMs), this.opts.evidence.freshnessWindowSeconds);
      if (fresh.includes(r.evidenceType)) findings.reasons.push(`${r.itemId}: ${stale.message} (${stale.remediation ?? ''})`);
      else findings.warnings.push(`${r.itemId}: ${stale.message}`);
    }
  }

  private decide(event: LifecycleEvent, decision: LifecycleDecision): LifecycleDecision {
    const nowMs = this.now();
    try {
      this.db
        .prepare('INSERT INTO gate_decisions (id, task_id, event_type, allow, reasons_json, created_at) VALUES (?, ?, ?, ?, ?, ?)')
        .run(
          nanoid(12),
          event.task_id ?? null,
          event.event_type,
          decision.allow ? 1 : 0,
          JSON.stringify({ reasons: decision.reasons, warnings: decision.warnings }),
          nowMs
        );
    } catch (err) {
      // the decision stands even if the ledger is unavailable
      this.opts.log.error({ err: errorMessage(err) }, 'gate.record_failed');
    }

    const level = decision.allow ? 'info' : 'warn';
    this.opts.log[level](
      { eventType: event.event_type, tool: event.tool_name, taskId: event.task_id, reasons: decision.reasons.length },
      'gate.result'
    );
    this.opts.onEvent?.({
      type: 'gate.result',
      eventType: event.event_type,
      allow: decision.allow,
      reasons: decision.reasons,
      ts: nowMs
    });
    return decision;
  }
}
