import { z } from 'zod';
import { SchemaViolation } from './errors.js';

export const EVIDENCE_TYPES = ['test_result', 'code_review', 'command_output', 'artifact'] as const;
export const EvidenceTypeSchema = z.enum(EVIDENCE_TYPES);
export type EvidenceType = z.infer<typeof EvidenceTypeSchema>;

export const EVIDENCE_ID_PATTERN = /^EVID-(\d{4})W(\d{2})-(\d{3})$/;
export const MAX_OUTPUT_SAMPLE_CHARS = 4000;

const NonEmpty = z.string().trim().min(1, 'must be a non-empty string');

export const VcsSchema = z.object({
  branch: NonEmpty,
  commit: z.string().regex(/^(?:[0-9a-f]{7,40}|unknown)$/, 'must be a short commit id or "unknown"')
});

export const CommandArtifactSchema = z.object({
  kind: z.literal('command'),
  command: NonEmpty,
  exit_code: z.number().int(),
  output_sample: NonEmpty
});

export const FileArtifactInputSchema = z.object({
  kind: z.literal('file'),
  path: NonEmpty
});

export const StoredFileArtifactSchema = FileArtifactInputSchema.extend({
  stored_path: NonEmpty,
  sha256: z.string().regex(/^[0-9a-f]{64}$/, 'must be a sha256 hex digest'),
  size: z.number().int().min(0)
});

const Common = {
  task_id: NonEmpty,
  checklist_item: NonEmpty,
  timestamp: z.string().datetime({ offset: true }).optional(),
  vcs: VcsSchema.optional()
};

const TestsSummary = z.object({
  passed: z.number().int().min(0),
  failed: z.number().int().min(0)
});

const ReviewVerdict = z.enum(['approved', 'changes_requested', 'commented']);

// Accepted from callers: no id, optional timestamp/vcs, file artifacts as a path to copy.
export const EvidenceInputSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('test_result'),
    ...Common,
    artifact: CommandArtifactSchema,
    tests: TestsSummary
  }),
  z.object({
    type: z.literal('code_review'),
    ...Common,
    reviewer: NonEmpty,
    verdict: ReviewVerdict,
    artifact: z.discriminatedUnion('kind', [CommandArtifactSchema, FileArtifactInputSchema])
  }),
  z.object({
    type: z.literal('command_output'),
    ...Common,
    artifact: CommandArtifactSchema
  }),
  z.object({
    type: z.literal('artifact'),
    ...Common,
    artifact: FileArtifactInputSchema
  })
]);

export type EvidenceInput = z.infer<typeof EvidenceInputSchema>;

const Stored = {
  id: z.string().regex(EVIDENCE_ID_PATTERN),
  task_id: NonEmpty,
  checklist_item: NonEmpty,
  timestamp: z.string().datetime({ offset: true }),
  vcs: VcsSchema
};

// As persisted: every field present, file artifacts resolved to a stored copy.
export const EvidenceRecordSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('test_result'),
    ...Stored,
    artifact: CommandArtifactSchema,
    tests: TestsSummary
  }),
  z.object({
    type: z.literal('code_review'),
    ...Stored,
    reviewer: NonEmpty,
    verdict: ReviewVerdict,
    artifact: z.discriminatedUnion('kind', [CommandArtifactSchema, StoredFileArtifactSchema])
  }),
  z.object({
    type: z.literal('command_output'),
    ...Stored,
    artifact: CommandArtifactSchema
  }),
  z.object({
    type: z.literal('artifact'),
    ...Stored,
    artifact: StoredFileArtifactSchema
  })
]);

export type EvidenceRecord = z.infer<typeof EvidenceRecordSchema>;
export type CommandArtifact = z.infer<typeof CommandArtifactSchema>;
export type StoredFileArtifact = z.infer<typeof StoredFileArtifactSchema>;

function declaredType(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('type' in raw)) return undefined;
  return typeof raw.type === 'string' ? raw.type : undefined;
}

function violationFrom(error: z.ZodError, raw: unknown): SchemaViolation {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'type';
  const detail = issue ? issue.message : 'invalid record';
  return new SchemaViolation(field, detail, declaredType(raw));
}

/** Structural validation against the schema of the record's declared type. */
export function parseEvidenceInput(raw: unknown): EvidenceInput {
  const parsed = EvidenceInputSchema.safeParse(raw);
  if (!parsed.success) throw violationFrom(parsed.error, raw);
  return parsed.data;
}

export function parseEvidenceRecord(raw: unknown): EvidenceRecord {
  const parsed = EvidenceRecordSchema.safeParse(raw);
  if (!parsed.success) throw violationFrom(parsed.error, raw);
  return parsed.data;
}

/** `EVID-2025W44-007` → `{ bucket: '2025W44', seq: 7 }`; null when malformed. */
export function parseEvidenceId(id: string): { bucket: string; seq: number } | null {
  const m = EVIDENCE_ID_PATTERN.exec(id);
  if (!m) return null;
  const week = Number(m[2]);
  if (week < 1 || week > 53) return null;
  const seq = Number(m[3]);
  if (seq < 1) return null;
  return { bucket: `${m[1]}W${m[2]}`, seq };
}

export function formatEvidenceId(bucket: string, seq: number): string {
  return `EVID-${bucket}-${String(seq).padStart(3, '0')}`;
}

export function clipSample(output: string): string {
  if (output.length <= MAX_OUTPUT_SAMPLE_CHARS) return output;
  return output.slice(0, MAX_OUTPUT_SAMPLE_CHARS) + `\n[clipped to ${MAX_OUTPUT_SAMPLE_CHARS} chars]`;
}
