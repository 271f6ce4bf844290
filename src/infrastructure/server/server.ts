import fastify, { FastifyInstance } from 'fastify';
import { EngineController } from '../../adapters/controllers/EngineController';
import { InlineRequest, SliceRequest } from '../../domain/entities';
import { inlineRequestSchema, sliceRequestSchema } from '../schemas';

export function createServer(controller: EngineController): FastifyInstance {
  const server = fastify({ bodyLimit: 16 * 1024 * 1024 });

  server.post<{ Body: SliceRequest }>(
    '/slice',
    { schema: { body: sliceRequestSchema } },
    controller.slice.bind(controller),
  );

  server.post<{ Body: InlineRequest }>(
    '/inline',
    { schema: { body: inlineRequestSchema } },
    controller.inline.bind(controller),
  );

  server.get('/health', async () => ({ status: 'ok' }));
  server.post('/shutdown', async () => {
    setTimeout(() => process.kill(process.pid, 'SIGTERM'), 200);
    return { status: 'shutting down' };
  });

  return server;
}
