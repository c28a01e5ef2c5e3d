import fs from 'node:fs/promises';
import path from 'node:path';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { CommandRunner } from '../infra/exec.js';
import { copyDurable, fsyncPath, pathExists, readJsonIfExists, writeDurable } from '../infra/files.js';
import { compactStamp, isoTimestamp, systemClock, type Clock } from './clock.js';
import { NotFoundError, ToolMissing } from './errors.js';

const SnapshotSchema = z.object({
  id: z.string(),
  created_at: z.string(),
  action: z.string(),
  kind: z.enum(['files', 'git', 'noop']),
  status: z.enum(['pending', 'restored']),
  /** files: repository-relative paths copied into the snapshot */
  files: z.array(z.string()).default([]),
  /** files: tracked paths that did not exist when the snapshot was taken */
  absent: z.array(z.string()).default([]),
  /** git: stash commit kept alive by a private ref */
  commit: z.string().optional(),
  restored_at: z.string().optional()
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

/**
 * Pre-mutation state capture. `create` returns only after the snapshot is
 * on disk; `restore` keeps the snapshot for audit; `discard` deletes it.
 */
export interface Snapshotter {
  create(action: string): Promise<Snapshot>;
  restore(snapshot: Snapshot): Promise<Snapshot>;
  discard(snapshot: Snapshot): Promise<void>;
  list(): Promise<Snapshot[]>;
}

/** Manifest directory shared by both snapshotters: `<dir>/<id>/manifest.json`. */
class ManifestStore {
  constructor(readonly dir: string) {}

  snapshotDir(id: string) {
    return path.join(this.dir, id);
  }

  async write(s: Snapshot): Promise<void> {
    await writeDurable(path.join(this.snapshotDir(s.id), 'manifest.json'), `${JSON.stringify(s, null, 2)}\n`);
  }

  async read(id: string): Promise<Snapshot> {
    const raw = await readJsonIfExists(path.join(this.snapshotDir(id), 'manifest.json'));
    if (raw === null) throw new NotFoundError('snapshot', id);
    return SnapshotSchema.parse(raw);
  }

  async list(): Promise<Snapshot[]> {
    const entries = await fs.readdir(this.dir, { withFileTypes: true }).catch((err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') return [];
      throw err;
    });
    const out: Snapshot[] = [];
    for (const e of entries) {
      if (!e.isDirectory()) continue;
      const raw = await readJsonIfExists(path.join(this.dir, e.name, 'manifest.json'));
      if (raw !== null) out.push(SnapshotSchema.parse(raw));
    }
    return out.sort((a, b) => a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id));
  }

  async remove(id: string): Promise<void> {
    await fs.rm(this.snapshotDir(id), { recursive: true, force: true });
  }
}

function newSnapshotId(nowMs: number): string {
  return `snap-${compactStamp(nowMs)}-${nanoid(6)}`;
}

export interface FileSnapshotterOptions {
  root: string;
  dir: string;
  /** repository-relative files the fixes may touch */
  paths: string[];
  log: Logger;
  now?: Clock;
}

/** Copies the tracked files aside. With none of them present the snapshot is a no-op marker. */
export class FileSnapshotter implements Snapshotter {
  private manifests: ManifestStore;
  private now: Clock;

  constructor(private opts: FileSnapshotterOptions) {
    this.manifests = new ManifestStore(opts.dir);
    this.now = opts.now ?? systemClock;
  }

  async create(action: string): Promise<Snapshot> {
    const nowMs = this.now();
    const id = newSnapshotId(nowMs);
    const filesDir = path.join(this.manifests.snapshotDir(id), 'files');

    const files: string[] = [];
    const absent: string[] = [];
    const copiedDirs = new Set<string>();
    for (const rel of this.opts.paths) {
      const src = path.join(this.opts.root, rel);
      if (!(await pathExists(src))) {
        absent.push(rel);
        continue;
      }
      const dest = path.join(filesDir, rel);
      await copyDurable(src, dest);
      copiedDirs.add(path.dirname(dest));
      files.push(rel);
    }
    for (const dir of copiedDirs) await fsyncPath(dir);

    const snapshot: Snapshot = {
      id,
      created_at: isoTimestamp(nowMs),
      action,
      kind: files.length === 0 ? 'noop' : 'files',
      status: 'pending',
      files,
      absent
    };
    await this.manifests.write(snapshot);
    this.opts.log.debug({ snapshotId: id, kind: snapshot.kind, files: files.length }, 'snapshot.created');
    return snapshot;
  }

  async restore(snapshot: Snapshot): Promise<Snapshot> {
    const current = await this.manifests.read(snapshot.id);
    const filesDir = path.join(this.manifests.snapshotDir(current.id), 'files');
    for (const rel of current.files) {
      await copyDurable(path.join(filesDir, rel), path.join(this.opts.root, rel));
    }
    for (const rel of current.absent) {
      await fs.rm(path.join(this.opts.root, rel), { force: true });
    }
    const restored: Snapshot = { ...current, status: 'restored', restored_at: isoTimestamp(this.now()) };
    await this.manifests.write(restored);
    this.opts.log.info({ snapshotId: current.id, files: current.files.length }, 'snapshot.restored');
    return restored;
  }

  async discard(snapshot: Snapshot): Promise<void> {
    await this.manifests.remove(snapshot.id);
  }

  list(): Promise<Snapshot[]> {
    return this.manifests.list();
  }
}

export interface GitSnapshotterOptions {
  root: string;
  dir: string;
  runner: CommandRunner;
  log: Logger;
  now?: Clock;
}

export const SNAPSHOT_REF_PREFIX = 'refs/phasegate/snapshots';

/**
 * Captures the working tree with `git stash create`, which leaves the tree
 * untouched, and pins the stash commit under a private ref. A clean tree
 * yields a no-op marker.
 */
export class GitSnapshotter implements Snapshotter {
  private manifests: ManifestStore;
  private now: Clock;

  constructor(private opts: GitSnapshotterOptions) {
    this.manifests = new ManifestStore(opts.dir);
    this.now = opts.now ?? systemClock;
  }

  private async git(args: string[]): Promise<string> {
    const res = await this.opts.runner.run(['git', ...args], { cwd: this.opts.root, timeoutMs: 30_000 });
    if (res.missing) throw new ToolMissing('git', 'auto-fix snapshot');
    if (!res.ok) throw new Error(`git ${args.join(' ')} failed: ${res.stderr.trim()}`);
    return res.stdout.trim();
  }

  async create(action: string): Promise<Snapshot> {
    const nowMs = this.now();
    const id = newSnapshotId(nowMs);
    const commit = await this.git(['stash', 'create', `phasegate snapshot ${id}: ${action}`]);
    if (commit) await this.git(['update-ref', `${SNAPSHOT_REF_PREFIX}/${id}`, commit]);

    const snapshot: Snapshot = {
      id,
      created_at: isoTimestamp(nowMs),
      action,
      kind: commit ? 'git' : 'noop',
      status: 'pending',
      files: [],
      absent: [],
      ...(commit ? { commit } : {})
    };
    await this.manifests.write(snapshot);
    this.opts.log.debug({ snapshotId: id, kind: snapshot.kind }, 'snapshot.created');
    return snapshot;
  }

  async restore(snapshot: Snapshot): Promise<Snapshot> {
    const current = await this.manifests.read(snapshot.id);
    await this.git(['reset', '--hard', 'HEAD']);
    if (current.commit) await this.git(['stash', 'apply', '--index', current.commit]);
    const restored: Snapshot = { ...current, status: 'restored', restored_at: isoTimestamp(this.now()) };
    await this.manifests.write(restored);
    this.opts.log.info({ snapshotId: current.id, commit: current.commit }, 'snapshot.restored');
    return restored;
  }

  async discard(snapshot: Snapshot): Promise<void> {
    if (snapshot.commit) await this.git(['update-ref', '-d', `${SNAPSHOT_REF_PREFIX}/${snapshot.id}`]);
    await this.manifests.remove(snapshot.id);
  }

  list(): Promise<Snapshot[]> {
    return this.manifests.list();
  }
}
