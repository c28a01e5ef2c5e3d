import pino from 'pino';
import type { PhaseGateConfig } from './config.js';

export function createLogger(cfg: Pick<PhaseGateConfig, 'PHASEGATE_LOG_LEVEL'>) {
  return pino({
    level: cfg.PHASEGATE_LOG_LEVEL,
    base: { service: 'phasegate' },
    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie', 'signingKey'],
      remove: true
    }
  });
}

/** Logger for the stdio surfaces: JSON lines go to stderr so stdout stays free for the protocol. */
export function createStderrLogger(level: PhaseGateConfig['PHASEGATE_LOG_LEVEL']) {
  return pino({ level, base: { service: 'phasegate' } }, pino.destination(2));
}
