import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { defaultPolicy, loadConfig, loadPolicy, parsePolicy, resolvePaths } from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';
import { tmpDir } from './helpers.js';

describe('loadConfig', () => {
  it('applies defaults and coerces numbers', () => {
    const cfg = loadConfig({ PHASEGATE_PORT: '5000' });
    expect(cfg).toMatchObject({
      PHASEGATE_PORT: 5000,
      PHASEGATE_BIND: '127.0.0.1',
      PHASEGATE_STATE_DIR: '.phasegate',
      PHASEGATE_LOG_LEVEL: 'info'
    });
    expect(cfg.PHASEGATE_SIGNING_KEY).toBeUndefined();
  });

  it('rejects a short signing key', () => {
    expect(() => loadConfig({ PHASEGATE_SIGNING_KEY: 'short' })).toThrow(/PHASEGATE_SIGNING_KEY/);
  });

  it('resolves state paths against the repository root', () => {
    const paths = resolvePaths(loadConfig({ PHASEGATE_REPO_ROOT: '/srv/repo', PHASEGATE_DB_PATH: ':memory:' }));
    expect(paths).toEqual({ repoRoot: '/srv/repo', stateDir: '/srv/repo/.phasegate', dbPath: ':memory:' });
  });
});

describe('policy', () => {
  it('has the documented defaults', () => {
    const policy = defaultPolicy();
    expect(policy.enforcement.mode).toBe('strict');
    expect(policy.agents.min_count_default).toBe(3);
    expect(policy.evidence).toEqual({ freshness_window_seconds: 3600, lookahead_lines: 5 });
    expect(policy.checklist.completion_threshold).toBe(0.9);
    expect(policy.auto_fix.tier2).toEqual({ confidence_range: [0.7, 0.95], max_attempts: 3 });
    expect(policy.git.protected_branches).toEqual(['main', 'master', 'production']);
  });

  it('names the offending key', () => {
    const err = (() => {
      try {
        parsePolicy({ checklist: { completion_threshold: 1.5 } });
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ key: 'checklist.completion_threshold' });
    expect(() => parsePolicy({ auto_fix: { tier2: { confidence_range: [0.9, 0.8] } } })).toThrow(
      "Invalid policy at 'auto_fix.tier2.confidence_range': lower bound 0.9 exceeds upper bound 0.8"
    );
  });

  it('reads the state directory config file', async () => {
    const dir = await tmpDir();
    expect(loadPolicy(dir)).toEqual(defaultPolicy());

    await fs.writeFile(path.join(dir, 'config.json'), JSON.stringify({ enforcement: { mode: 'advisory' } }));
    expect(loadPolicy(dir).enforcement.mode).toBe('advisory');

    await fs.writeFile(path.join(dir, 'config.json'), '{ not json');
    expect(() => loadPolicy(dir)).toThrow(ConfigError);
  });
});
