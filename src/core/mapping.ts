import type { Logger } from 'pino';
import { z } from 'zod';
import { readJsonIfExists, withFileLock, writeJsonAtomic } from '../infra/files.js';
import { addressesKeyword, escapeRegExp } from './checklist.js';
import { DuplicatePlanId, NotFoundError, SchemaViolation } from './errors.js';
import type { ChecklistItemResult, EvidenceStore } from './evidence.js';
import { EvidenceTypeSchema, type EvidenceType } from './evidence-schema.js';

export const MAPPING_VERSION = 1;

const ItemId = z.string().regex(/^[A-Za-z0-9][\w.-]*$/, 'must be a stable identifier');

const MappingFileSchema = z.object({
  version: z.literal(MAPPING_VERSION),
  plan_file: z.string(),
  checklist_file: z.string(),
  mappings: z.array(
    z.object({
      plan_section: z.string(),
      plan_items: z.array(z.object({ id: ItemId, text: z.string(), keywords: z.array(z.string().min(1)).optional() })),
      checklist_items: z.array(z.object({ id: ItemId, text: z.string(), required_evidence_type: EvidenceTypeSchema }))
    })
  )
});

export type MappingFile = z.infer<typeof MappingFileSchema>;
export type MappingEntry = MappingFile['mappings'][number];

export interface BindOptions {
  planSection?: string;
  planText?: string;
  checklistTexts?: Record<string, string>;
  /** words a checked item must mention in visible text to count as addressing the plan item */
  keywords?: string[];
}

export type HollowReason = 'missing' | 'invalid' | 'type_mismatch' | 'keyword_unaddressed';

export interface HollowItem {
  itemId: string;
  line: number;
  reason: HollowReason;
  detail: string;
}

export interface AuditReport {
  total: number;
  complete_with_evidence: number;
  complete_without_evidence: number;
  incomplete: number;
  /** complete_with_evidence / total; 0 for an empty checklist */
  completion_ratio: number;
  hollow: HollowItem[];
  incomplete_items: { itemId: string; line: number }[];
  /** checked items with no mapping entry, or with only a line-number id */
  unmapped_items: string[];
  /** mapped checklist ids that no longer appear in the checklist */
  orphaned_items: string[];
}

export interface KeywordAudit {
  text: string;
  byItem: Map<string, string[]>;
  lookahead: number;
}

export interface SearchHit {
  planItemId: string;
  planSection: string;
  field: 'plan' | 'checklist';
  id: string;
  text: string;
}

export interface MappingStoreOptions {
  file: string;
  evidence: EvidenceStore;
  log: Logger;
  planFile?: string;
  checklistFile?: string;
}

function sameSet(a: string[], b: string[]): boolean {
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return b.every((x) => set.has(x));
}

/**
 * Plan item ↔ checklist item bindings by stable id. Rewording either
 * document does not affect a binding; only the ids matter.
 */
export class MappingStore {
  constructor(private opts: MappingStoreOptions) {}

  get file(): string {
    return this.opts.file;
  }

  async read(): Promise<MappingFile> {
    const raw = await readJsonIfExists(this.opts.file);
    if (raw === null) {
      return {
        version: MAPPING_VERSION,
        plan_file: this.opts.planFile ?? 'plan.md',
        checklist_file: this.opts.checklistFile ?? 'checklist.md',
        mappings: []
      };
    }
    const parsed = MappingFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SchemaViolation(issue ? issue.path.join('.') : 'mappings', issue?.message ?? 'invalid mapping file');
    }
    return parsed.data;
  }

  async size(): Promise<number> {
    return (await this.read()).mappings.length;
  }

  /** Idempotent upsert of one plan item's binding. */
  async bind(
    planItemId: string,
    checklistItemIds: string[],
    requiredEvidenceType: EvidenceType,
    opts: BindOptions = {}
  ): Promise<MappingEntry> {
    const planId = ItemId.safeParse(planItemId);
    if (!planId.success) throw new SchemaViolation('plan_item_id', planId.error.issues[0]?.message ?? 'invalid');
    if (checklistItemIds.length === 0) throw new SchemaViolation('checklist_item_ids', 'at least one checklist item id is required');
    for (const id of checklistItemIds) {
      const parsed = ItemId.safeParse(id);
      if (!parsed.success) throw new SchemaViolation('checklist_item_ids', `'${id}' ${parsed.error.issues[0]?.message ?? 'is invalid'}`);
    }
    const evidenceType = EvidenceTypeSchema.safeParse(requiredEvidenceType);
    if (!evidenceType.success) throw new SchemaViolation('required_evidence_type', evidenceType.error.issues[0]?.message ?? 'invalid');
    const ids = [...new Set(checklistItemIds)];

    return withFileLock(this.opts.file, async () => {
      const doc = await this.read();
      const existing = doc.mappings.find((m) => m.plan_items.some((p) => p.id === planItemId));

      if (existing) {
        const bound = existing.checklist_items.map((c) => c.id);
        if (!sameSet(bound, ids)) throw new DuplicatePlanId(planItemId, bound);
        // same binding again: refresh texts and required type only
        for (const c of existing.checklist_items) {
          c.required_evidence_type = evidenceType.data;
          const text = opts.checklistTexts?.[c.id];
          if (text !== undefined) c.text = text;
        }
        const plan = existing.plan_items.find((p) => p.id === planItemId);
        if (plan && opts.planText !== undefined) plan.text = opts.planText;
        if (plan && opts.keywords !== undefined) plan.keywords = cleanKeywords(opts.keywords);
        await writeJsonAtomic(this.opts.file, doc);
        return existing;
      }

      for (const m of doc.mappings) {
        const taken = m.checklist_items.find((c) => ids.includes(c.id));
        if (taken) {
          const owner = m.plan_items[0]?.id ?? m.plan_section;
          throw new DuplicatePlanId(planItemId, [`${taken.id} (bound to ${owner})`]);
        }
      }

      const entry: MappingEntry = {
        plan_section: opts.planSection ?? '',
        plan_items: [
          opts.keywords === undefined
            ? { id: planItemId, text: opts.planText ?? '' }
            : { id: planItemId, text: opts.planText ?? '', keywords: cleanKeywords(opts.keywords) }
        ],
        checklist_items: ids.map((id) => ({
          id,
          text: opts.checklistTexts?.[id] ?? '',
          required_evidence_type: evidenceType.data
        }))
      };
      doc.mappings.push(entry);
      await writeJsonAtomic(this.opts.file, doc);
      this.opts.log.info({ planItemId, checklistItemIds: ids, requiredEvidenceType }, 'mapping.bound');
      return entry;
    });
  }

  async resolveByPlanId(planItemId: string): Promise<string[]> {
    const doc = await this.read();
    const entry = doc.mappings.find((m) => m.plan_items.some((p) => p.id === planItemId));
    if (!entry) throw new NotFoundError('mapping', planItemId);
    return entry.checklist_items.map((c) => c.id);
  }

  /** Required evidence type per mapped checklist id. */
  async requirements(): Promise<Map<string, EvidenceType>> {
    const doc = await this.read();
    const out = new Map<string, EvidenceType>();
    for (const m of doc.mappings) {
      for (const c of m.checklist_items) out.set(c.id, c.required_evidence_type);
    }
    return out;
  }

  /** Case-insensitive substring search; the query is matched literally. */
  async search(query: string): Promise<SearchHit[]> {
    const needle = query.trim();
    if (!needle) return [];
    const re = new RegExp(escapeRegExp(needle), 'i');
    const hits: SearchHit[] = [];
    for (const m of (await this.read()).mappings) {
      const planItemId = m.plan_items[0]?.id ?? '';
      for (const p of m.plan_items) {
        if (re.test(p.id) || re.test(p.text)) hits.push({ planItemId, planSection: m.plan_section, field: 'plan', id: p.id, text: p.text });
      }
      for (const c of m.checklist_items) {
        if (re.test(c.id) || re.test(c.text)) hits.push({ planItemId, planSection: m.plan_section, field: 'checklist', id: c.id, text: c.text });
      }
    }
    return hits;
  }

  /** Keywords each mapped checklist id inherits from its plan items. */
  async keywordRequirements(): Promise<Map<string, string[]>> {
    const out = new Map<string, string[]>();
    for (const m of (await this.read()).mappings) {
      const words = [...new Set(m.plan_items.flatMap((p) => p.keywords ?? []))];
      if (words.length === 0) continue;
      for (const c of m.checklist_items) out.set(c.id, words);
    }
    return out;
  }

  /** Audit over results already validated from `checklistText`. */
  async report(checklistText: string, results: ChecklistItemResult[]): Promise<AuditReport> {
    return buildAuditReport(results, await this.requirements(), {
      text: checklistText,
      byItem: await this.keywordRequirements(),
      lookahead: this.opts.evidence.lookahead
    });
  }

  /** `taskId` restricts accepted evidence to records of that task. */
  async audit(checklistText: string, opts: { taskId?: string } = {}): Promise<AuditReport> {
    const results = await this.opts.evidence.validateChecklist(checklistText, opts);
    return this.report(checklistText, results);
  }
}

function cleanKeywords(words: string[]): string[] {
  return [...new Set(words.map((w) => w.trim()).filter((w) => w !== ''))];
}

/** Pure part of the audit, shared with the state machine and the lifecycle gate. */
export function buildAuditReport(
  results: ChecklistItemResult[],
  required: Map<string, EvidenceType>,
  keywords?: KeywordAudit
): AuditReport {
  const report: AuditReport = {
    total: results.length,
    complete_with_evidence: 0,
    complete_without_evidence: 0,
    incomplete: 0,
    completion_ratio: 0,
    hollow: [],
    incomplete_items: [],
    unmapped_items: [],
    orphaned_items: []
  };

  const seen = new Set<string>();
  for (const r of results) {
    seen.add(r.itemId);
    if (!r.checked) {
      report.incomplete++;
      report.incomplete_items.push({ itemId: r.itemId, line: r.line });
      continue;
    }

    const requiredType = required.get(r.itemId);
    if (requiredType === undefined) report.unmapped_items.push(r.itemId);

    if (r.status === 'EVIDENCE') {
      if (requiredType !== undefined && r.evidenceType !== requiredType) {
        report.complete_without_evidence++;
        report.hollow.push({
          itemId: r.itemId,
          line: r.line,
          reason: 'type_mismatch',
          detail: `${r.evidenceId ?? 'evidence'} is ${r.evidenceType ?? 'untyped'}, expected ${requiredType}`
        });
        continue;
      }
      const missed = keywords ? unaddressedKeywords(r.itemId, keywords) : [];
      if (missed.length > 0) {
        report.complete_without_evidence++;
        report.hollow.push({
          itemId: r.itemId,
          line: r.line,
          reason: 'keyword_unaddressed',
          detail: `does not mention ${missed.map((k) => `"${k}"`).join(', ')} outside code`
        });
        continue;
      }
      report.complete_with_evidence++;
      continue;
    }

    report.complete_without_evidence++;
    report.hollow.push({
      itemId: r.itemId,
      line: r.line,
      reason: r.status === 'INVALID' ? 'invalid' : 'missing',
      detail: r.reason ?? r.status
    });
  }

  for (const id of required.keys()) {
    if (!seen.has(id)) report.orphaned_items.push(id);
  }
  report.completion_ratio = report.total === 0 ? 0 : report.complete_with_evidence / report.total;
  return report;
}

function unaddressedKeywords(itemId: string, audit: KeywordAudit): string[] {
  const words = audit.byItem.get(itemId) ?? [];
  return words.filter((w) => !addressesKeyword(audit.text, itemId, w, { lookahead: audit.lookahead }));
}

/** `CL-3 (line 12): no evidence reference within 5 lines of line 12` */
export function describeHollow(item: HollowItem): string {
  return `${item.itemId} (line ${item.line}): ${item.detail}`;
}
