import fs from 'node:fs/promises';
import path from 'node:path';
import * as lockfile from 'proper-lockfile';
import { isErrnoException } from '../core/config.js';

const LOCK_OPTIONS = {
  retries: { retries: 40, minTimeout: 20, maxTimeout: 250, randomize: true },
  stale: 10_000,
  realpath: false
};

/**
 * Exclusive advisory lock scoped to `file`, held while `fn` runs.
 * The lock is released on every exit path, including a throwing `fn`.
 */
export async function withFileLock<T>(file: string, fn: () => Promise<T>): Promise<T> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const release = await lockfile.lock(file, LOCK_OPTIONS);
  try {
    return await fn();
  } finally {
    await release();
  }
}

export async function readJson(file: string): Promise<unknown> {
  const raw = await fs.readFile(file, 'utf8');
  return JSON.parse(raw);
}

/** Returns null when the file does not exist; any other failure propagates. */
export async function readJsonIfExists(file: string): Promise<unknown | null> {
  try {
    return await readJson(file);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

/** Replace `file` atomically: readers see the old or the new content, never a torn write. */
export async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.tmp.${process.pid}.${Date.now()}`;
  await fs.writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`);
  await fs.rename(tmp, file);
}

/** Create `file` exclusively and flush it and its directory entry; fails with EEXIST if it is already there. */
export async function writeOnceDurable(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const handle = await fs.open(file, 'wx');
  try {
    await handle.writeFile(content, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fsyncPath(path.dirname(file));
}

/** Flush a file, or a directory's entries, to disk. */
export async function fsyncPath(p: string): Promise<void> {
  const handle = await fs.open(p, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/** Copy `src` over `dest` and flush the copy before returning. */
export async function copyDurable(src: string, dest: string): Promise<void> {
  await fs.mkdir(path.dirname(dest), { recursive: true });
  await fs.copyFile(src, dest);
  await fsyncPath(dest);
}

/** Overwrite `file` and flush it and its directory entry before returning. */
export async function writeDurable(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const handle = await fs.open(file, 'w');
  try {
    await handle.writeFile(content, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fsyncPath(path.dirname(file));
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/** Normalise to forward slashes relative to `root`, for glob matching. */
export function toRelPosix(root: string, p: string): string {
  const abs = path.isAbsolute(p) ? p : path.join(root, p);
  return path.relative(root, abs).split(path.sep).join('/');
}
