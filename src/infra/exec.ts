import { execFile } from 'node:child_process';

export interface ExecResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  output: string;
  /** Set when the executable itself could not be found. */
  missing: boolean;
}

/** Runs argv-style commands; injected wherever the engine shells out so tests can substitute it. */
export interface CommandRunner {
  run(cmd: string[], opts?: { cwd?: string; timeoutMs?: number }): Promise<ExecResult>;
}

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_BUFFER = 10 * 1024 * 1024;

export const processRunner: CommandRunner = {
  run(cmd, opts = {}) {
    const [file, ...args] = cmd;
    if (!file) return Promise.reject(new Error('Empty command'));
    return new Promise((resolve) => {
      execFile(
        file,
        args,
        { cwd: opts.cwd, timeout: opts.timeoutMs ?? DEFAULT_TIMEOUT_MS, maxBuffer: MAX_BUFFER, encoding: 'utf8' },
        (err, stdout, stderr) => {
          if (!err) {
            resolve({ ok: true, exitCode: 0, stdout, stderr, output: stdout + stderr, missing: false });
            return;
          }
          const missing = err.code === 'ENOENT';
          const exitCode = typeof err.code === 'number' ? err.code : 127;
          resolve({ ok: false, exitCode, stdout, stderr: stderr || err.message, output: stdout + (stderr || err.message), missing });
        }
      );
    });
  }
};
