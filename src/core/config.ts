import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const EnvSchema = z.object({
  PHASEGATE_PORT: z.coerce.number().int().positive().default(4178),
  PHASEGATE_BIND: z.string().default('127.0.0.1'),
  PHASEGATE_REPO_ROOT: z.string().default('.'),
  PHASEGATE_STATE_DIR: z.string().default('.phasegate'),
  PHASEGATE_DB_PATH: z.string().default('.phasegate/ledger.sqlite'),
  PHASEGATE_RATE_LIMIT_RPM: z.coerce.number().int().positive().default(300),
  PHASEGATE_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  PHASEGATE_SIGNING_KEY: z.string().min(16).optional()
});

export type PhaseGateConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): PhaseGateConfig {
  // If you use dotenv, load it before calling this function.
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${msg}`);
  }
  return parsed.data;
}

const RiskSchema = z.enum(['low', 'medium', 'high']);

export const FixPatternSchema = z.object({
  id: z.string().min(1),
  match: z.string().min(1),
  risk: RiskSchema,
  description: z.string().default(''),
  commands: z.array(z.array(z.string().min(1)).min(1)).default([])
});

export type FixPatternConfig = z.infer<typeof FixPatternSchema>;

const Ratio = z.number().min(0).max(1);

const PolicySchema = z.object({
  enforcement: z
    .object({
      mode: z.enum(['strict', 'advisory', 'disabled']).default('strict')
    })
    .default({}),
  agents: z
    .object({
      min_count_default: z.number().int().min(0).default(3)
    })
    .default({}),
  lanes: z
    .object({
      fast: z
        .object({
          max_lines: z.number().int().positive().default(50),
          allowed_paths: z.array(z.string().min(1)).default(['docs/**', '**/*.md', 'src/**', 'tests/**'])
        })
        .default({})
    })
    .default({}),
  evidence: z
    .object({
      freshness_window_seconds: z.number().int().positive().default(3600),
      lookahead_lines: z.number().int().min(0).max(50).default(5)
    })
    .default({}),
  checklist: z
    .object({
      completion_threshold: Ratio.default(0.9)
    })
    .default({}),
  auto_fix: z
    .object({
      tier1: z.object({ confidence_min: Ratio.default(0.95) }).default({}),
      tier2: z
        .object({
          confidence_range: z.tuple([Ratio, Ratio]).default([0.7, 0.95]),
          max_attempts: z.number().int().positive().max(10).default(3)
        })
        .default({}),
      tier3: z.object({ always_confirm: z.boolean().default(true) }).default({}),
      patterns: z.array(FixPatternSchema).default([])
    })
    .default({}),
  git: z
    .object({
      protected_branches: z.array(z.string().min(1)).default(['main', 'master', 'production'])
    })
    .default({})
});

export type Policy = z.infer<typeof PolicySchema>;
export type EnforcementMode = Policy['enforcement']['mode'];

export const POLICY_FILE = 'config.json';

export function parsePolicy(raw: unknown): Policy {
  const parsed = PolicySchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join('.') : '(root)';
    throw new ConfigError(key, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  const [low, high] = parsed.data.auto_fix.tier2.confidence_range;
  if (low > high) {
    throw new ConfigError('auto_fix.tier2.confidence_range', `lower bound ${low} exceeds upper bound ${high}`);
  }
  return parsed.data;
}

export function defaultPolicy(): Policy {
  return parsePolicy({});
}

/** Reads `<stateDir>/config.json`; a missing file yields the defaults. */
export function loadPolicy(stateDir: string): Policy {
  const file = path.join(stateDir, POLICY_FILE);
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return defaultPolicy();
    throw err;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError('(root)', `${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parsePolicy(raw);
}

export interface ResolvedPaths {
  repoRoot: string;
  stateDir: string;
  dbPath: string;
}

export function resolvePaths(cfg: PhaseGateConfig): ResolvedPaths {
  const repoRoot = path.resolve(cfg.PHASEGATE_REPO_ROOT);
  const dbPath =
    cfg.PHASEGATE_DB_PATH === ':memory:' ? ':memory:' : path.resolve(repoRoot, cfg.PHASEGATE_DB_PATH);
  return {
    repoRoot,
    stateDir: path.resolve(repoRoot, cfg.PHASEGATE_STATE_DIR),
    dbPath
  };
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
