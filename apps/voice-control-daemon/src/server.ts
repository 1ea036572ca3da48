import Fastify from 'fastify';
import fastifyWebsocket from '@fastify/websocket';
import type { SocketStream } from '@fastify/websocket';
import { WebSocket } from 'ws';
import type { PipelineStatusEvent, StatusBus } from '@lightcue/pipeline-events';
import { logger } from './logger';
import type { SupervisorStatus } from './supervisor';

export interface StatusSource {
  readonly mode: 'gated' | 'continuous';
  status(): SupervisorStatus;
}

export interface StatusServerOptions {
  source: StatusSource;
  bus: StatusBus;
  clock?: () => number;
}

// ─── Status Server ────────────────────────────────────────────────────────────

export function buildStatusServer({ source, bus, clock = Date.now }: StatusServerOptions) {
  const app = Fastify({ logger: false });
  const clients = new Set<WebSocket>();

  function broadcast(event: PipelineStatusEvent): void {
    const msg = JSON.stringify(event);
    for (const client of clients) {
      if (client.readyState !== WebSocket.OPEN) {
        clients.delete(client);
        continue;
      }

      try {
        client.send(msg);
      } catch (err) {
        logger.debug({ err }, 'dropping status client after failed send');
        clients.delete(client);
      }
    }
  }

  const unsubscribe = bus.subscribe(broadcast);

  app.addHook('onClose', async () => {
    unsubscribe();
    for (const client of clients) client.close();
    clients.clear();
  });

  app.register(fastifyWebsocket);

  app.register(async (fastify) => {
    /** Live feed of wake, transcript, command and restart events */
    fastify.get('/ws', { websocket: true }, (connection: SocketStream) => {
      const socket = connection.socket;
      clients.add(socket);
      logger.info({ clientCount: clients.size }, 'status client connected');

      connection.on('close', () => {
        clients.delete(socket);
        logger.info({ clientCount: clients.size }, 'status client disconnected');
      });
    });

    fastify.get('/health', async () => {
      const { restarts, stages, timers } = source.status();
      const healthy = stages.length > 0 && stages.every((stage) => stage.state === 'running');
      return {
        status: healthy ? 'ok' : 'degraded',
        mode: source.mode,
        restarts,
        stages,
        timers: timers.length,
        timestamp: clock(),
      };
    });
  });

  return app;
}
