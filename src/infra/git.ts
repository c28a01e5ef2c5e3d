import type { Logger } from 'pino';
import { ToolMissing } from '../core/errors.js';
import type { CommandRunner } from './exec.js';

export interface VcsContext {
  branch: string;
  commit: string;
}

export const UNKNOWN_VCS: VcsContext = { branch: 'unknown', commit: 'unknown' };

/** Git queries used by the checks. Each degrades to `null`/unknown with a warning when git is absent. */
export class GitProbe {
  constructor(private root: string, private runner: CommandRunner, private log: Logger) {}

  private async git(args: string[], check: string): Promise<string | null> {
    const res = await this.runner.run(['git', ...args], { cwd: this.root, timeoutMs: 10_000 });
    if (res.missing) {
      const warning = new ToolMissing('git', check);
      this.log.warn({ code: warning.code, check }, warning.message);
      return null;
    }
    if (!res.ok) {
      this.log.debug({ args, stderr: res.stderr.trim() }, 'git command failed');
      return null;
    }
    return res.stdout.trim();
  }

  async context(): Promise<VcsContext> {
    const branch = await this.git(['rev-parse', '--abbrev-ref', 'HEAD'], 'version-control context');
    if (branch === null) return UNKNOWN_VCS;
    const commit = await this.git(['rev-parse', '--short', 'HEAD'], 'version-control context');
    return { branch: branch || 'unknown', commit: commit || 'unknown' };
  }

  async currentBranch(): Promise<string | null> {
    const branch = await this.git(['rev-parse', '--abbrev-ref', 'HEAD'], 'protected-branch check');
    return branch || null;
  }

  /** Added plus deleted lines in the staged diff; null when git cannot tell. */
  async stagedLineCount(): Promise<number | null> {
    const out = await this.git(['diff', '--cached', '--numstat'], 'fast-lane size check');
    if (out === null) return null;
    let total = 0;
    for (const line of out.split('\n')) {
      const [added, deleted] = line.split('\t');
      // binary files report "-"
      total += Number.parseInt(added ?? '', 10) || 0;
      total += Number.parseInt(deleted ?? '', 10) || 0;
    }
    return total;
  }
}
