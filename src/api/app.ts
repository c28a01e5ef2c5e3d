import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import websocket from '@fastify/websocket';
import type WebSocket from 'ws';
import type { Engine } from '../core/engine.js';
import type { EngineEvent } from '../core/types.js';
import { EventRing } from './feed.js';
import { registerRoutes } from './routes.js';

export interface AppOptions {
  logger: FastifyBaseLogger | boolean;
  rateLimitRpm: number;
  feedSize?: number;
}

/** HTTP surface over the engine: JSON API plus a websocket feed of engine events. */
export async function buildApp(engine: Engine, opts: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: opts.logger });

  const wsClients = new Set<WebSocket>();
  const feed = new EventRing(opts.feedSize ?? 500);

  function broadcast(evt: EngineEvent) {
    feed.push(evt);
    for (const client of wsClients) {
      if (client.readyState === 1) {
        client.send(JSON.stringify(evt));
      }
    }
  }

  const unsubscribe = engine.subscribe(broadcast);
  app.addHook('onClose', async () => {
    unsubscribe();
    for (const client of wsClients) client.close();
  });

  await app.register(helmet, { global: true });
  await app.register(rateLimit, { max: opts.rateLimitRpm, timeWindow: '1 minute' });
  await app.register(websocket);

  await registerRoutes(app, engine, feed);

  app.get('/ws', { websocket: true }, (socket) => {
    wsClients.add(socket);
    socket.send(JSON.stringify({ type: 'phasegate.hello', ts: Date.now() }));

    socket.on('close', () => {
      wsClients.delete(socket);
    });
  });

  return app;
}
