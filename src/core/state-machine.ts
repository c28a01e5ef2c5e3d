import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { pathExists, readJsonIfExists, writeDurable } from '../infra/files.js';
import { isoTimestamp, systemClock, type Clock } from './clock.js';
import { SchemaViolation, StaleEvidence } from './errors.js';
import type { EvidenceStore } from './evidence.js';
import type { EvidenceRecord, EvidenceType } from './evidence-schema.js';
import type { AuditReport, MappingStore } from './mapping.js';
import { nextPhase, PHASES, phaseDefinition, phaseIndex, phaseLabel, TERMINAL_PHASE, type Phase } from './phases.js';
import { hmacHex, safeEqualHex } from './signing.js';
import { currentPhase, type TaskNamespace } from './tasks.js';
import type { EventSink, PhaseHistoryEntry, Task, UnmetCondition } from './types.js';

export interface PredicateInput {
  task: Task;
  from: Phase;
  to: Phase;
  /** every evidence record of the task */
  records: EvidenceRecord[];
  /** null when the task has no checklist file */
  audit: AuditReport | null;
  agentCount: number;
  mappingSize: number;
  completionThreshold: number;
  freshnessWindowSeconds: number;
  now: number;
}

function percent(ratio: number): string {
  return `${Math.round(ratio * 1000) / 10}%`;
}

function latestOfType(records: EvidenceRecord[], type: EvidenceType): EvidenceRecord | null {
  let latest: EvidenceRecord | null = null;
  for (const r of records) {
    if (r.type !== type) continue;
    if (!latest || Date.parse(r.timestamp) > Date.parse(latest.timestamp)) latest = r;
  }
  return latest;
}

function ageSeconds(record: EvidenceRecord, now: number): number {
  return Math.max(0, Math.floor((now - Date.parse(record.timestamp)) / 1000));
}

/** Records dated after `now` never count as fresh. */
function isStale(record: EvidenceRecord, now: number, windowSeconds: number): boolean {
  return Date.parse(record.timestamp) > now || ageSeconds(record, now) > windowSeconds;
}

/**
 * Conditions that keep the task in `from`. Pure: the same input always
 * yields the same list, in the same order.
 */
export function evaluatePredicate(input: PredicateInput): UnmetCondition[] {
  const { task, from, to, audit } = input;
  const unmet: UnmetCondition[] = [];

  if (task.archived_at) {
    unmet.push({ code: 'ARCHIVED', message: `Task ${task.id} is archived` });
    return unmet;
  }
  const current = currentPhase(task);
  if (current !== from) {
    unmet.push({
      code: 'PHASE_MISMATCH',
      message: `Task is in ${phaseLabel(current)}, not ${phaseLabel(from)}`,
      remediation: `Request the advance from ${current}`
    });
    return unmet;
  }
  const successor = nextPhase(from);
  if (successor === null) {
    unmet.push({ code: 'TERMINAL', message: `${phaseLabel(from)} is the terminal phase` });
    return unmet;
  }
  if (to !== successor) {
    unmet.push({
      code: 'NOT_SUCCESSOR',
      message: `${phaseLabel(to)} is not the immediate successor of ${phaseLabel(from)}`,
      remediation: `Advance to ${phaseLabel(successor)}; phases cannot be skipped or reordered`
    });
    return unmet;
  }

  const def = phaseDefinition(from);

  if (def.requiresMapping && task.lane === 'full' && input.mappingSize === 0) {
    unmet.push({
      code: 'MAPPING_EMPTY',
      message: 'No plan item is bound to a checklist item',
      remediation: 'Bind plan items to checklist ids before leaving this phase'
    });
  }

  if (def.checklist) {
    if (!audit || audit.total === 0) {
      unmet.push({
        code: 'CHECKLIST_EMPTY',
        message: 'The task checklist has no items',
        remediation: 'Write the checklist for this phase and tick items with evidence references'
      });
    } else {
      if (audit.completion_ratio < input.completionThreshold) {
        const missing = [
          ...audit.incomplete_items.map((i) => ({ itemId: i.itemId, line: i.line })),
          ...audit.hollow.map((h) => ({ itemId: h.itemId, line: h.line }))
        ].sort((a, b) => a.line - b.line);
        unmet.push({
          code: 'CHECKLIST_BELOW_THRESHOLD',
          message:
            `Checklist completion with evidence is ${percent(audit.completion_ratio)} ` +
            `(${audit.complete_with_evidence}/${audit.total}), below the ${percent(input.completionThreshold)} threshold`,
          remediation: 'Complete the listed items and reference an evidence record for each',
          items: missing.map((m) => m.itemId)
        });
      }
      if (audit.hollow.length > 0) {
        unmet.push({
          code: 'HOLLOW_ITEMS',
          message: `${audit.hollow.length} checked item(s) have no valid evidence behind them`,
          remediation: 'Append an evidence record and add <!-- evidence: EVID-... --> within the lookahead window',
          items: audit.hollow.map((h) => `${h.itemId} (line ${h.line}): ${h.detail}`)
        });
      }
    }
  }

  for (const type of def.requiredEvidence) {
    const latest = latestOfType(input.records, type);
    if (!latest) {
      unmet.push({
        code: 'MISSING_EVIDENCE_TYPE',
        message: `No ${type} evidence recorded for this task`,
        remediation: `Append a ${type} evidence record`
      });
      continue;
    }
    if (def.freshEvidence.includes(type)) {
      const age = ageSeconds(latest, input.now);
      if (isStale(latest, input.now, input.freshnessWindowSeconds)) {
        const stale = new StaleEvidence(latest.id, age, input.freshnessWindowSeconds);
        unmet.push({ code: 'STALE_EVIDENCE', message: stale.message, remediation: stale.remediation, items: [latest.id] });
      }
    }
  }

  if (def.requiresAgents && input.agentCount < task.required_agent_count) {
    unmet.push({
      code: 'AGENT_COUNT',
      message: `${input.agentCount} of ${task.required_agent_count} required agents invoked for the ${task.lane} lane`,
      remediation: 'Dispatch the remaining agents and record each invocation'
    });
  }

  return unmet;
}

/** Stale proof for phases that do not require fresh evidence: reported, not blocking. */
export function freshnessWarnings(input: PredicateInput): string[] {
  const def = phaseDefinition(input.from);
  const warnings: string[] = [];
  for (const type of def.requiredEvidence) {
    if (def.freshEvidence.includes(type)) continue;
    const latest = latestOfType(input.records, type);
    if (!latest) continue;
    const age = ageSeconds(latest, input.now);
    if (isStale(latest, input.now, input.freshnessWindowSeconds)) {
      warnings.push(new StaleEvidence(latest.id, age, input.freshnessWindowSeconds).message);
    }
  }
  return warnings;
}

const GateReceiptSchema = z.object({
  task_id: z.string(),
  phase: z.enum(PHASES),
  passed_at: z.string(),
  history_sha256: z.string(),
  /** null when no signing key is configured */
  signature: z.string().nullable()
});

export type GateReceipt = z.infer<typeof GateReceiptSchema>;

export type AdvanceResult =
  | { ok: true; task: Task; receipt: GateReceipt; warnings: string[] }
  | { ok: false; unmet: UnmetCondition[]; warnings: string[] };

export interface ReceiptVerification {
  ok: boolean;
  checked: number;
  problems: string[];
}

export interface AgentCounter {
  count(taskId: string): number;
}

export interface PhaseMachineOptions {
  tasks: TaskNamespace;
  evidence: EvidenceStore;
  mappingFor: (taskDir: string) => MappingStore;
  agents: AgentCounter;
  log: Logger;
  completionThreshold: number;
  freshnessWindowSeconds: number;
  signingKey?: string;
  now?: Clock;
  onEvent?: EventSink;
}

function historyDigest(history: PhaseHistoryEntry[]): string {
  return createHash('sha256').update(JSON.stringify(history)).digest('hex');
}

function receiptPayload(r: Omit<GateReceipt, 'signature'>): string {
  return [r.task_id, r.phase, r.passed_at, r.history_sha256].join('|');
}

export function receiptFile(taskDir: string, phase: Phase): string {
  return path.join(taskDir, 'gates', `${String(phaseIndex(phase) + 1).padStart(2, '0')}-${phase}.ok`);
}

/** Where the checklist of a task lives: the mapping's `checklist_file`, relative to the task directory. */
export async function checklistPathFor(taskDir: string, mapping: MappingStore): Promise<string> {
  const file = (await mapping.read()).checklist_file;
  return path.isAbsolute(file) ? file : path.join(taskDir, file);
}

export class PhaseMachine {
  private now: Clock;

  constructor(private opts: PhaseMachineOptions) {
    this.now = opts.now ?? systemClock;
  }

  private sign(payload: string): string | null {
    if (!this.opts.signingKey) return null;
    return hmacHex(this.opts.signingKey, payload);
  }

  /** Collects everything the predicate reads for `task` leaving `from`. */
  async predicateInput(task: Task, from: Phase, to: Phase): Promise<PredicateInput> {
    const dir = await this.opts.tasks.taskDir(task.id);
    const mapping = this.opts.mappingFor(dir);
    const checklistFile = await checklistPathFor(dir, mapping);

    let audit: AuditReport | null = null;
    if (await pathExists(checklistFile)) {
      const text = await fs.readFile(checklistFile, 'utf8');
      audit = await mapping.audit(text, { taskId: task.id });
    }

    return {
      task,
      from,
      to,
      records: await this.opts.evidence.list({ taskId: task.id }),
      audit,
      agentCount: this.opts.agents.count(task.id),
      mappingSize: await mapping.size(),
      completionThreshold: this.opts.completionThreshold,
      freshnessWindowSeconds: this.opts.freshnessWindowSeconds,
      now: this.now()
    };
  }

  async attemptAdvance(taskId: string, from: Phase, to: Phase): Promise<AdvanceResult> {
    const task = await this.opts.tasks.resolve(taskId);
    const input = await this.predicateInput(task, from, to);
    const unmet = evaluatePredicate(input);
    const warnings = unmet.length === 0 ? freshnessWarnings(input) : [];

    if (unmet.length > 0) return this.refuse(task.id, from, unmet, warnings);

    const nowMs = this.now();
    const stamp = isoTimestamp(nowMs);
    const guard = { raced: false };
    const updated = await this.opts.tasks.update(task.id, (t) => {
      if (currentPhase(t) !== from) {
        guard.raced = true;
        return;
      }
      const open = t.phase_history[t.phase_history.length - 1];
      if (open) {
        open.exited_at = stamp;
        open.gate_passed = true;
      }
      t.phase_history.push({ phase: to, entered_at: stamp, exited_at: null, gate_passed: null });
    });
    if (guard.raced) {
      const phase = currentPhase(updated);
      return this.refuse(task.id, from, [{ code: 'PHASE_MISMATCH', message: `Task moved to ${phaseLabel(phase)} concurrently` }], []);
    }

    const receipt = await this.writeReceipt(updated, from, stamp);
    const final = to === TERMINAL_PHASE ? await this.opts.tasks.archive(task.id) : updated;

    this.opts.log.info({ taskId: task.id, from, to, warnings: warnings.length }, 'phase.advanced');
    this.opts.onEvent?.({ type: 'phase.advanced', taskId: task.id, from, to, ts: nowMs });
    return { ok: true, task: final, receipt, warnings };
  }

  private refuse(taskId: string, from: Phase, unmet: UnmetCondition[], warnings: string[]): AdvanceResult {
    this.opts.log.warn({ taskId, from, unmet: unmet.map((u) => u.code) }, 'phase.refused');
    this.opts.onEvent?.({ type: 'phase.refused', taskId, from, unmet: unmet.map((u) => u.message), ts: this.now() });
    return { ok: false, unmet, warnings };
  }

  private async writeReceipt(task: Task, phase: Phase, passedAt: string): Promise<GateReceipt> {
    let idx = task.phase_history.length - 1;
    while (idx >= 0 && task.phase_history[idx]?.exited_at !== passedAt) idx--;
    const body = {
      task_id: task.id,
      phase,
      passed_at: passedAt,
      history_sha256: historyDigest(task.phase_history.slice(0, idx + 1))
    };
    const receipt: GateReceipt = { ...body, signature: this.sign(receiptPayload(body)) };
    const dir = await this.opts.tasks.taskDir(task.id);
    await writeDurable(receiptFile(dir, phase), `${JSON.stringify(receipt, null, 2)}\n`);
    return receipt;
  }

  /** Administrative re-entry into an earlier phase. Never called by the advance path. */
  async rollbackTo(taskId: string, phase: Phase, opts: { reason: string; actor: string }): Promise<Task> {
    if (!opts.reason.trim()) throw new SchemaViolation('reason', 'a rollback needs a reason');
    if (!opts.actor.trim()) throw new SchemaViolation('actor', 'a rollback needs an actor');
    const before = await this.opts.tasks.resolve(taskId);
    const current = currentPhase(before);
    if (phaseIndex(phase) >= phaseIndex(current)) {
      throw new SchemaViolation('phase', `rollback target must precede the current phase ${phaseLabel(current)}`);
    }

    const nowMs = this.now();
    const stamp = isoTimestamp(nowMs);
    const reentry = `${opts.actor}: ${opts.reason.trim()}`;
    const task = await this.opts.tasks.update(taskId, (t) => {
      const open = t.phase_history[t.phase_history.length - 1];
      if (open && open.exited_at === null) {
        open.exited_at = stamp;
        open.gate_passed = false;
      }
      t.phase_history.push({ phase, entered_at: stamp, exited_at: null, gate_passed: null, reentry_reason: reentry });
    });

    this.opts.log.warn({ taskId, from: current, to: phase, actor: opts.actor }, 'phase.rollback');
    this.opts.onEvent?.({ type: 'phase.rollback', taskId, to: phase, reason: reentry, ts: nowMs });
    return task;
  }

  /** Every passed gate must have a receipt that matches the history and, with a key, its signature. */
  async verifyReceipts(taskId: string): Promise<ReceiptVerification> {
    const task = await this.opts.tasks.resolve(taskId);
    const dir = await this.opts.tasks.taskDir(taskId);
    const problems: string[] = [];

    const latestPass = new Map<Phase, number>();
    task.phase_history.forEach((e, i) => {
      if (e.gate_passed === true) latestPass.set(e.phase, i);
    });

    for (const [phase, idx] of latestPass) {
      const entry = task.phase_history[idx];
      const raw = await readJsonIfExists(receiptFile(dir, phase));
      if (!entry || raw === null) {
        problems.push(`${phaseLabel(phase)}: gate receipt missing`);
        continue;
      }
      const parsed = GateReceiptSchema.safeParse(raw);
      if (!parsed.success) {
        problems.push(`${phaseLabel(phase)}: gate receipt unreadable`);
        continue;
      }
      const receipt = parsed.data;
      const expected = {
        task_id: task.id,
        phase,
        passed_at: entry.exited_at ?? '',
        history_sha256: historyDigest(task.phase_history.slice(0, idx + 1))
      };
      if (
        receipt.phase !== phase ||
        receipt.task_id !== task.id ||
        receipt.passed_at !== expected.passed_at ||
        receipt.history_sha256 !== expected.history_sha256
      ) {
        problems.push(`${phaseLabel(phase)}: gate receipt does not match the phase history`);
        continue;
      }
      const signature = this.sign(receiptPayload(expected));
      if (signature === null) continue;
      if (receipt.signature === null || !safeEqualHex(receipt.signature, signature)) {
        problems.push(`${phaseLabel(phase)}: gate receipt signature invalid`);
      }
    }

    return { ok: problems.length === 0, checked: latestPass.size, problems };
  }
}
