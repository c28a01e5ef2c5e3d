import fs from 'node:fs/promises';
import path from 'node:path';
import { customAlphabet } from 'nanoid';
import type { Logger } from 'pino';
import { z } from 'zod';
import { isErrnoException } from './config.js';
import { readJson, withFileLock, writeJsonAtomic } from '../infra/files.js';
import { compactStamp, isoTimestamp, systemClock, type Clock } from './clock.js';
import { CollisionError, NotFoundError, SchemaViolation } from './errors.js';
import { INITIAL_PHASE, PHASES } from './phases.js';
import type { EventSink, Lane, Task } from './types.js';

const MAX_CREATE_ATTEMPTS = 5;
const TASK_FILE = 'task.json';

const SLUG_RE = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
export const TASK_ID_RE = /^[a-z0-9]+(?:-[a-z0-9]+)*-\d{8}T\d{6}Z-[a-z0-9]{6}$/;

const suffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 6);

const PhaseHistoryEntrySchema = z.object({
  phase: z.enum(PHASES),
  entered_at: z.string(),
  exited_at: z.string().nullable(),
  gate_passed: z.boolean().nullable(),
  reentry_reason: z.string().optional()
});

const TaskSchema = z.object({
  id: z.string().regex(TASK_ID_RE),
  slug: z.string().regex(SLUG_RE),
  lane: z.enum(['fast', 'full']),
  started_at: z.string(),
  phase_history: z.array(PhaseHistoryEntrySchema).min(1),
  required_agent_count: z.number().int().min(0),
  invoked_agents: z.array(z.string()),
  archived_at: z.string().optional()
});

export interface TaskNamespaceOptions {
  root: string;
  log: Logger;
  /** required agent count for full-lane tasks */
  minAgentCount: number;
  now?: Clock;
  idSuffix?: () => string;
  onEvent?: EventSink;
}

/** Slug from free text: `Add rate limiter!` → `add-rate-limiter`. */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 48)
    .replace(/-+$/g, '');
}

export function currentPhase(task: Task) {
  const last = task.phase_history[task.phase_history.length - 1];
  if (!last) throw new Error(`Task ${task.id} has an empty phase history`);
  return last.phase;
}

/**
 * One private directory per task:
 *
 *   <root>/tasks/<id>/task.json     descriptor
 *   <root>/tasks/<id>/.gitignore    keeps the directory out of commits
 *   <root>/archive/<id>/            after closure
 */
export class TaskNamespace {
  private now: Clock;
  private idSuffix: () => string;

  constructor(private opts: TaskNamespaceOptions) {
    this.now = opts.now ?? systemClock;
    this.idSuffix = opts.idSuffix ?? (() => suffix());
  }

  private activeDir(id: string) {
    return path.join(this.opts.root, 'tasks', id);
  }

  private archivedDir(id: string) {
    return path.join(this.opts.root, 'archive', id);
  }

  requiredAgentCount(lane: Lane): number {
    return lane === 'fast' ? 0 : this.opts.minAgentCount;
  }

  async create(slugInput: string, opts: { lane?: Lane } = {}): Promise<Task> {
    const slug = SLUG_RE.test(slugInput) ? slugInput : slugify(slugInput);
    if (!slug) throw new SchemaViolation('slug', `cannot derive a slug from '${slugInput}'`);
    const lane = opts.lane ?? 'full';

    await fs.mkdir(path.join(this.opts.root, 'tasks'), { recursive: true });

    for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt++) {
      const nowMs = this.now();
      const id = `${slug}-${compactStamp(nowMs)}-${this.idSuffix()}`;
      const dir = this.activeDir(id);
      try {
        await fs.mkdir(dir);
      } catch (err) {
        if (isErrnoException(err) && err.code === 'EEXIST') {
          const collision = new CollisionError(id);
          this.opts.log.debug({ id, attempt }, collision.message);
          continue;
        }
        throw err;
      }

      const enteredAt = isoTimestamp(nowMs);
      const task: Task = {
        id,
        slug,
        lane,
        started_at: enteredAt,
        phase_history: [{ phase: INITIAL_PHASE, entered_at: enteredAt, exited_at: null, gate_passed: null }],
        required_agent_count: this.requiredAgentCount(lane),
        invoked_agents: []
      };
      await fs.writeFile(path.join(dir, '.gitignore'), '*\n');
      await writeJsonAtomic(path.join(dir, TASK_FILE), task);

      this.opts.log.info({ taskId: id, lane }, 'task.created');
      this.opts.onEvent?.({ type: 'task.created', taskId: id, lane, ts: nowMs });
      return task;
    }
    throw new CollisionError(`${slug}-*`);
  }

  /** Directory of an active or archived task. */
  async locate(id: string): Promise<{ dir: string; archived: boolean }> {
    if (!TASK_ID_RE.test(id)) throw new NotFoundError('task', id, 'malformed task id');
    for (const [dir, archived] of [
      [this.activeDir(id), false],
      [this.archivedDir(id), true]
    ] as const) {
      try {
        const stat = await fs.stat(dir);
        if (stat.isDirectory()) return { dir, archived };
      } catch (err) {
        if (!isErrnoException(err) || err.code !== 'ENOENT') throw err;
      }
    }
    throw new NotFoundError('task', id);
  }

  async taskDir(id: string): Promise<string> {
    return (await this.locate(id)).dir;
  }

  async resolve(id: string): Promise<Task> {
    const { dir } = await this.locate(id);
    let raw: unknown;
    try {
      raw = await readJson(path.join(dir, TASK_FILE));
    } catch (err) {
      throw new NotFoundError('task', id, `descriptor unreadable: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = TaskSchema.safeParse(raw);
    if (!parsed.success) throw new NotFoundError('task', id, 'descriptor invalid');
    return parsed.data;
  }

  /** Exclusive read-modify-write of the task descriptor. */
  async update(id: string, mutate: (task: Task) => void): Promise<Task> {
    const { dir, archived } = await this.locate(id);
    if (archived) throw new NotFoundError('task', id, 'task is archived');
    const file = path.join(dir, TASK_FILE);
    return withFileLock(file, async () => {
      const current = await this.resolve(id);
      const before = structuredClone(current);
      mutate(current);
      assertHistoryAppendOnly(before, current);
      await writeJsonAtomic(file, current);
      return current;
    });
  }

  async addInvokedAgent(id: string, agentName: string): Promise<Task> {
    return this.update(id, (task) => {
      if (!task.invoked_agents.includes(agentName)) task.invoked_agents.push(agentName);
    });
  }

  async list(): Promise<string[]> {
    const entries = await fs
      .readdir(path.join(this.opts.root, 'tasks'), { withFileTypes: true })
      .catch((err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT') return [];
        throw err;
      });
    return entries
      .filter((e) => e.isDirectory() && TASK_ID_RE.test(e.name))
      .map((e) => e.name)
      .sort();
  }

  /** Moves the task under archive/. The directory is never deleted. */
  async archive(id: string): Promise<Task> {
    const archivedAt = isoTimestamp(this.now());
    await this.update(id, (task) => {
      task.archived_at = archivedAt;
    });
    await fs.mkdir(path.join(this.opts.root, 'archive'), { recursive: true });
    await fs.rename(this.activeDir(id), this.archivedDir(id));
    this.opts.log.info({ taskId: id }, 'task.archived');
    this.opts.onEvent?.({ type: 'task.archived', taskId: id, ts: this.now() });
    return this.resolve(id);
  }
}

function sameEntry(a: Task['phase_history'][number], b: Task['phase_history'][number]): boolean {
  return (
    a.phase === b.phase &&
    a.entered_at === b.entered_at &&
    a.exited_at === b.exited_at &&
    a.gate_passed === b.gate_passed &&
    a.reentry_reason === b.reentry_reason
  );
}

/**
 * Earlier entries are immutable; the last entry may only have its open
 * exit fields filled; new entries may only be appended.
 */
function assertHistoryAppendOnly(before: Task, after: Task): void {
  const prev = before.phase_history;
  const next = after.phase_history;
  if (next.length < prev.length) throw new Error(`phase_history of ${before.id} cannot shrink`);
  prev.forEach((entry, i) => {
    const updated = next[i];
    if (!updated) return;
    if (sameEntry(entry, updated)) return;
    const isOpenLast = i === prev.length - 1 && entry.exited_at === null && entry.gate_passed === null;
    const onlyClosed =
      isOpenLast &&
      updated.phase === entry.phase &&
      updated.entered_at === entry.entered_at &&
      updated.reentry_reason === entry.reentry_reason;
    if (!onlyClosed) throw new Error(`phase_history entry ${i} of ${before.id} is immutable`);
  });
}
