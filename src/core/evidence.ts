import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { readJsonIfExists, withFileLock, writeJsonAtomic, writeOnceDurable } from '../infra/files.js';
import type { VcsContext } from '../infra/git.js';
import { scanChecklist, DEFAULT_LOOKAHEAD } from './checklist.js';
import { isoTimestamp, parseTimestamp, systemClock, weekBucket, type Clock } from './clock.js';
import { isErrnoException } from './config.js';
import { BucketExhausted, errorMessage, NotFoundError, SchemaViolation } from './errors.js';
import {
  clipSample,
  EvidenceTypeSchema,
  formatEvidenceId,
  parseEvidenceId,
  parseEvidenceInput,
  parseEvidenceRecord,
  type EvidenceRecord,
  type EvidenceType
} from './evidence-schema.js';
import type { EventSink } from './types.js';

const MAX_SEQUENCE = 999;
const RECORD_FILE_RE = /^(EVID-\d{4}W\d{2}-\d{3})\.json$/;

const IndexEntrySchema = z.object({
  id: z.string(),
  type: EvidenceTypeSchema,
  task_id: z.string(),
  checklist_item: z.string(),
  timestamp: z.string()
});

const BucketIndexSchema = z.object({
  bucket: z.string(),
  next_seq: z.number().int().min(1),
  records: z.array(IndexEntrySchema)
});

type BucketIndex = z.infer<typeof BucketIndexSchema>;
export type EvidenceIndexEntry = z.infer<typeof IndexEntrySchema>;

export type ChecklistStatus = 'EVIDENCE' | 'MISSING' | 'INVALID' | 'INCOMPLETE';

export interface ChecklistItemResult {
  itemId: string;
  stableId: boolean;
  line: number;
  checked: boolean;
  text: string;
  status: ChecklistStatus;
  evidenceId?: string;
  evidenceType?: EvidenceType;
  evidenceTimestamp?: string;
  reason?: string;
}

export type Freshness = 'fresh' | 'stale';

export interface EvidenceStoreOptions {
  root: string;
  log: Logger;
  vcs: () => Promise<VcsContext>;
  now?: Clock;
  freshnessWindowSeconds?: number;
  lookahead?: number;
  onEvent?: EventSink;
}

/**
 * Append-only evidence records, bucketed by ISO week:
 *
 *   <root>/<2025W44>/index.json           aggregate index (locked read-modify-write)
 *   <root>/<2025W44>/EVID-2025W44-001.json written once
 *   <root>/<2025W44>/artifacts/<sha256>   copied file artifacts
 */
export class EvidenceStore {
  private now: Clock;
  readonly freshnessWindowSeconds: number;
  readonly lookahead: number;

  constructor(private opts: EvidenceStoreOptions) {
    this.now = opts.now ?? systemClock;
    this.freshnessWindowSeconds = opts.freshnessWindowSeconds ?? 3600;
    this.lookahead = opts.lookahead ?? DEFAULT_LOOKAHEAD;
  }

  private bucketDir(bucket: string) {
    return path.join(this.opts.root, bucket);
  }

  private indexPath(bucket: string) {
    return path.join(this.bucketDir(bucket), 'index.json');
  }

  private recordPath(id: string, bucket: string) {
    return path.join(this.bucketDir(bucket), `${id}.json`);
  }

  private async readIndex(bucket: string): Promise<BucketIndex> {
    const raw = await readJsonIfExists(this.indexPath(bucket));
    if (raw === null) return { bucket, next_seq: 1, records: [] };
    return BucketIndexSchema.parse(raw);
  }

  /**
   * A caller-supplied `timestamp` may backdate a record but never postdate
   * it; the record lands in the bucket of its own week.
   */
  async append(raw: unknown): Promise<EvidenceRecord> {
    const input = parseEvidenceInput(raw);
    const nowMs = this.now();
    const recordedMs = input.timestamp === undefined ? nowMs : parseTimestamp(input.timestamp);
    if (recordedMs > nowMs) {
      throw new SchemaViolation('timestamp', `${input.timestamp ?? ''} is later than the current time ${isoTimestamp(nowMs)}`);
    }
    const bucket = weekBucket(recordedMs);
    const vcs = input.vcs ?? (await this.opts.vcs());
    const timestamp = isoTimestamp(recordedMs);

    const artifact =
      input.artifact.kind === 'file'
        ? await this.copyArtifact(bucket, input.artifact.path)
        : { ...input.artifact, output_sample: clipSample(input.artifact.output_sample) };
    const body = { ...input, timestamp, vcs, artifact };

    const record = await withFileLock(this.indexPath(bucket), async () => {
      const index = await this.readIndex(bucket);
      let rec = await this.writeRecord(bucket, index.next_seq, body);
      if (!rec) {
        // a record file exists that the index never learned about
        await this.recoverIndex(bucket, index);
        rec = await this.writeRecord(bucket, index.next_seq, body);
        if (!rec) throw new Error(`Evidence sequence ${index.next_seq} of ${bucket} is taken outside the index lock`);
      }

      index.next_seq = parseSeq(rec.id) + 1;
      index.records.push({
        id: rec.id,
        type: rec.type,
        task_id: rec.task_id,
        checklist_item: rec.checklist_item,
        timestamp: rec.timestamp
      });
      await writeJsonAtomic(this.indexPath(bucket), index);
      return rec;
    });

    this.opts.log.info({ evidenceId: record.id, type: record.type, taskId: record.task_id }, 'evidence.appended');
    this.opts.onEvent?.({
      type: 'evidence.appended',
      evidenceId: record.id,
      taskId: record.task_id,
      evidenceType: record.type,
      ts: nowMs
    });
    return record;
  }

  /** null when the record file for `seq` already exists. */
  private async writeRecord(bucket: string, seq: number, body: object): Promise<EvidenceRecord | null> {
    if (seq > MAX_SEQUENCE) throw new BucketExhausted(bucket);
    const rec = parseEvidenceRecord({ id: formatEvidenceId(bucket, seq), ...body });
    try {
      await writeOnceDurable(this.recordPath(rec.id, bucket), `${JSON.stringify(rec, null, 2)}\n`);
      return rec;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') return null;
      throw err;
    }
  }

  /** Re-indexes record files missing from `index` and moves `next_seq` past every file on disk. */
  private async recoverIndex(bucket: string, index: BucketIndex): Promise<void> {
    const known = new Set(index.records.map((r) => r.id));
    let maxSeq = index.next_seq - 1;
    for (const name of (await fs.readdir(this.bucketDir(bucket))).sort()) {
      const id = RECORD_FILE_RE.exec(name)?.[1];
      if (!id) continue;
      maxSeq = Math.max(maxSeq, parseSeq(id));
      if (known.has(id)) continue;
      const rec = await this.lookup(id).catch((err: unknown) => {
        this.opts.log.warn({ evidenceId: id, err: errorMessage(err) }, 'evidence.unreadable');
        return null;
      });
      if (rec) {
        index.records.push({ id, type: rec.type, task_id: rec.task_id, checklist_item: rec.checklist_item, timestamp: rec.timestamp });
      }
    }
    index.records.sort((a, b) => a.id.localeCompare(b.id));
    index.next_seq = maxSeq + 1;
    this.opts.log.warn({ bucket, nextSeq: index.next_seq }, 'evidence.index_recovered');
  }

  private async copyArtifact(bucket: string, source: string) {
    const content = await fs.readFile(source);
    const sha256 = createHash('sha256').update(content).digest('hex');
    const storedPath = path.join(this.bucketDir(bucket), 'artifacts', sha256);
    await fs.mkdir(path.dirname(storedPath), { recursive: true });
    // content-addressed: an existing copy is already identical
    await fs.writeFile(storedPath, content, { flag: 'wx' }).catch((err: NodeJS.ErrnoException) => {
      if (err.code !== 'EEXIST') throw err;
    });
    return {
      kind: 'file' as const,
      path: source,
      stored_path: path.relative(this.opts.root, storedPath).split(path.sep).join('/'),
      sha256,
      size: content.length
    };
  }

  /** null for malformed ids and for ids with no record on disk. */
  async lookup(id: string): Promise<EvidenceRecord | null> {
    const parsed = parseEvidenceId(id);
    if (!parsed) return null;
    const raw = await readJsonIfExists(this.recordPath(id, parsed.bucket));
    if (raw === null) return null;
    return parseEvidenceRecord(raw);
  }

  async require(id: string): Promise<EvidenceRecord> {
    const rec = await this.lookup(id);
    if (!rec) throw new NotFoundError('evidence', id);
    return rec;
  }

  async buckets(): Promise<string[]> {
    const entries = await fs.readdir(this.opts.root, { withFileTypes: true }).catch((err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') return [];
      throw err;
    });
    return entries
      .filter((e) => e.isDirectory() && /^\d{4}W\d{2}$/.test(e.name))
      .map((e) => e.name)
      .sort();
  }

  /** Index entries across every bucket, oldest first. */
  async entries(filter: { taskId?: string; type?: EvidenceType } = {}): Promise<EvidenceIndexEntry[]> {
    const out: EvidenceIndexEntry[] = [];
    for (const bucket of await this.buckets()) {
      const index = await this.readIndex(bucket);
      for (const e of index.records) {
        if (filter.taskId && e.task_id !== filter.taskId) continue;
        if (filter.type && e.type !== filter.type) continue;
        out.push(e);
      }
    }
    return out;
  }

  async list(filter: { taskId?: string; type?: EvidenceType } = {}): Promise<EvidenceRecord[]> {
    const out: EvidenceRecord[] = [];
    for (const e of await this.entries(filter)) {
      const rec = await this.lookup(e.id);
      if (rec) out.push(rec);
    }
    return out;
  }

  ageSeconds(record: Pick<EvidenceRecord, 'timestamp'>, nowMs = this.now()): number {
    return Math.max(0, Math.floor((nowMs - parseTimestamp(record.timestamp)) / 1000));
  }

  /** Records dated after `nowMs` are stale. */
  freshness(record: Pick<EvidenceRecord, 'timestamp'>, nowMs = this.now()): Freshness {
    if (parseTimestamp(record.timestamp) > nowMs) return 'stale';
    return this.ageSeconds(record, nowMs) <= this.freshnessWindowSeconds ? 'fresh' : 'stale';
  }

  /**
   * Resolves the evidence reference of every checked item. Reads only, so
   * repeated calls over the same text and store give the same answer.
   * With `taskId`, a record belonging to another task is INVALID.
   */
  async validateChecklist(text: string, opts: { taskId?: string } = {}): Promise<ChecklistItemResult[]> {
    const results: ChecklistItemResult[] = [];
    for (const item of scanChecklist(text, { lookahead: this.lookahead })) {
      const base = { itemId: item.itemId, stableId: item.stableId, line: item.line, checked: item.checked, text: item.text };
      if (!item.checked) {
        results.push({ ...base, status: 'INCOMPLETE' });
        continue;
      }
      const ref = item.refs[0];
      if (!ref) {
        results.push({
          ...base,
          status: 'MISSING',
          reason: `no evidence reference within ${this.lookahead} lines of line ${item.line}`
        });
        continue;
      }
      if (!parseEvidenceId(ref.raw)) {
        results.push({ ...base, status: 'INVALID', evidenceId: ref.raw, reason: `malformed evidence id '${ref.raw}'` });
        continue;
      }
      let rec: EvidenceRecord | null;
      try {
        rec = await this.lookup(ref.raw);
      } catch (err) {
        results.push({ ...base, status: 'INVALID', evidenceId: ref.raw, reason: `evidence ${ref.raw} is unreadable: ${errorMessage(err)}` });
        continue;
      }
      if (!rec) {
        results.push({ ...base, status: 'INVALID', evidenceId: ref.raw, reason: `evidence ${ref.raw} does not resolve` });
        continue;
      }
      if (opts.taskId !== undefined && rec.task_id !== opts.taskId) {
        results.push({ ...base, status: 'INVALID', evidenceId: rec.id, reason: `evidence ${rec.id} belongs to task ${rec.task_id}` });
        continue;
      }
      results.push({
        ...base,
        status: 'EVIDENCE',
        evidenceId: rec.id,
        evidenceType: rec.type,
        evidenceTimestamp: rec.timestamp
      });
    }
    return results;
  }
}

function parseSeq(id: string): number {
  return parseEvidenceId(id)?.seq ?? 0;
}

/** `{ item_id: EvidenceId | 'MISSING' | 'INVALID' }` for the checked items. */
export function statusMap(results: ChecklistItemResult[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const r of results) {
    if (!r.checked) continue;
    out[r.itemId] = r.status === 'EVIDENCE' && r.evidenceId ? r.evidenceId : r.status;
  }
  return out;
}
