import type { AutoFixEvent, AutoFixLog } from './autofix.js';
import { isoTimestamp, systemClock, type Clock } from './clock.js';
import type { EvidenceStore } from './evidence.js';

/** A checklist and, when known, the task whose evidence it may cite. */
export interface KpiChecklist {
  text: string;
  taskId?: string;
}

export interface KpiPeriod {
  /** epoch ms, inclusive */
  since: number;
  /** epoch ms, exclusive */
  until: number;
}

export interface KpiReport {
  period: { since: string; until: string };
  detections: number;
  attempts: number;
  rollbacks: number;
  successes: number;
  escalations: number;
  /** (attempts - rollbacks) / attempts */
  auto_fix_success_rate: number | null;
  /** mean of (last success in period - first detection) per signature */
  mttr_ms: number | null;
  /** complete_with_evidence / (complete_with_evidence + complete_without_evidence) */
  evidence_compliance: number | null;
  /** share of successful fixes whose pattern had already succeeded before */
  reuse_rate: number | null;
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

export interface KpiReporterOptions {
  ledger: AutoFixLog;
  evidence: EvidenceStore;
  now?: Clock;
}

export class KpiReporter {
  private now: Clock;

  constructor(private opts: KpiReporterOptions) {
    this.now = opts.now ?? systemClock;
  }

  /** Defaults to the last seven days. */
  defaultPeriod(): KpiPeriod {
    const until = this.now() + 1;
    return { since: until - 7 * 86_400_000, until };
  }

  async report(period: KpiPeriod = this.defaultPeriod(), sources: { checklists?: KpiChecklist[] } = {}): Promise<KpiReport> {
    // everything before `until` is needed for first detections and earlier successes
    const history = this.opts.ledger.events({ until: period.until });
    const inPeriod = history.filter((e) => e.createdAt >= period.since);
    const count = (kind: AutoFixEvent['kind']) => inPeriod.filter((e) => e.kind === kind).length;

    const attempts = count('attempt');
    const rollbacks = count('rollback');

    return {
      period: { since: isoTimestamp(period.since), until: isoTimestamp(period.until) },
      detections: count('detected'),
      attempts,
      rollbacks,
      successes: count('success'),
      escalations: count('escalated'),
      auto_fix_success_rate: ratio(attempts - rollbacks, attempts),
      mttr_ms: meanTimeToRepair(history, period),
      evidence_compliance: await this.compliance(sources.checklists ?? []),
      reuse_rate: reuseRate(history, period)
    };
  }

  private async compliance(checklists: KpiChecklist[]): Promise<number | null> {
    let withEvidence = 0;
    let withoutEvidence = 0;
    for (const { text, taskId } of checklists) {
      for (const r of await this.opts.evidence.validateChecklist(text, { taskId })) {
        if (!r.checked) continue;
        if (r.status === 'EVIDENCE') withEvidence++;
        else withoutEvidence++;
      }
    }
    return ratio(withEvidence, withEvidence + withoutEvidence);
  }
}

/** `history` must be ordered oldest first. */
export function meanTimeToRepair(history: AutoFixEvent[], period: KpiPeriod): number | null {
  const firstDetection = new Map<string, number>();
  const lastFix = new Map<string, number>();
  for (const e of history) {
    if (e.kind === 'detected' && !firstDetection.has(e.signature)) firstDetection.set(e.signature, e.createdAt);
    if (e.kind === 'success' && e.createdAt >= period.since && e.createdAt < period.until) lastFix.set(e.signature, e.createdAt);
  }
  const durations: number[] = [];
  for (const [signature, fixedAt] of lastFix) {
    const detectedAt = firstDetection.get(signature);
    if (detectedAt !== undefined) durations.push(fixedAt - detectedAt);
  }
  if (durations.length === 0) return null;
  return durations.reduce((a, b) => a + b, 0) / durations.length;
}

export function reuseRate(history: AutoFixEvent[], period: KpiPeriod): number | null {
  const succeeded = new Set<string>();
  let successes = 0;
  let reused = 0;
  for (const e of history) {
    if (e.kind !== 'success') continue;
    const key = e.patternId ?? e.signature;
    if (e.createdAt >= period.since) {
      successes++;
      if (succeeded.has(key)) reused++;
    }
    succeeded.add(key);
  }
  return ratio(reused, successes);
}
