import { buildApp } from './api/app.js';
import { loadConfig, loadPolicy, resolvePaths } from './core/config.js';
import { Engine } from './core/engine.js';
import { createLogger } from './core/logger.js';

async function main() {
  const cfg = loadConfig(process.env);
  const log = createLogger(cfg);
  const paths = resolvePaths(cfg);
  const policy = loadPolicy(paths.stateDir);

  const engine = new Engine({ paths, policy, log, signingKey: cfg.PHASEGATE_SIGNING_KEY });
  const app = await buildApp(engine, { logger: log, rateLimitRpm: cfg.PHASEGATE_RATE_LIMIT_RPM });

  app.addHook('onClose', async () => {
    engine.close();
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down...');
    await app.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      log.error({ err, signal }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  const addr = await app.listen({ port: cfg.PHASEGATE_PORT, host: cfg.PHASEGATE_BIND });
  log.info({ addr, repoRoot: paths.repoRoot, enforcement: policy.enforcement.mode }, 'phasegate listening');
}

main().catch((err) => {
  console.error('Failed to start phasegate:', err);
  process.exit(1);
});
