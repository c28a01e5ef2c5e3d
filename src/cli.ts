#!/usr/bin/env node
import { CommanderError } from 'commander';
import { buildProgram } from './cli/program.js';
import { loadConfig, loadPolicy, resolvePaths } from './core/config.js';
import { Engine } from './core/engine.js';
import { createStderrLogger } from './core/logger.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function main() {
  const cfg = loadConfig(process.env);
  // stdout is for command output; only warnings and worse reach stderr by default
  const log = createStderrLogger(cfg.PHASEGATE_LOG_LEVEL === 'info' ? 'warn' : cfg.PHASEGATE_LOG_LEVEL);
  const program = buildProgram({
    engine: () => {
      const paths = resolvePaths(cfg);
      return new Engine({ paths, policy: loadPolicy(paths.stateDir), log, signingKey: cfg.PHASEGATE_SIGNING_KEY });
    },
    signingKey: cfg.PHASEGATE_SIGNING_KEY,
    io: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
      readStdin,
      setExitCode: (code) => {
        process.exitCode = code;
      }
    }
  });
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error('phasegate:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
