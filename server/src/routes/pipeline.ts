import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import type { SessionController } from '../pipeline/session-controller.js';
import { EXAMPLE_PIPELINE_CONFIG } from '../pipeline/schemas/pipeline-config.js';
import type { CommandResult } from '../pipeline/types.js';

const selectSchema = z.object({
  topic_ids: z.array(z.number().int().nonnegative()).max(1000),
});

export interface PipelineRouteOptions {
  maxConfigBodyBytes: number;
  heartbeatMs: number;
}

function commandResponse<T extends object>(c: Context, result: CommandResult<T>) {
  if (result.accepted) {
    return c.json({ status: 'started', ...result }, 202);
  }
  const status = result.code === 'VALIDATION' ? 400 : 409;
  return c.json({ error: result.error, code: result.code, details: result.details }, status);
}

export function createPipelineRoutes(controller: SessionController, options: PipelineRouteOptions) {
  const pipeline = new Hono();

  // POST /pipeline/start
  // Body: pipeline configuration
  pipeline.post('/start', async (c) => {
    const body = await parseJsonBodyWithLimit(c, options.maxConfigBodyBytes);
    if (!body.ok) return body.response;

    const result = await controller.start(body.data);
    if (result.accepted) {
      c.get('log').info({ session_id: result.session_id }, 'Start accepted');
    }
    return commandResponse(c, result);
  });

  // POST /pipeline/select
  // Body: { topic_ids: number[] }
  pipeline.post('/select', async (c) => {
    const body = await parseJsonBodyWithLimit(c, options.maxConfigBodyBytes);
    if (!body.ok) return body.response;

    const parsed = selectSchema.safeParse(body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', code: 'VALIDATION', details: parsed.error.issues }, 400);
    }
    return commandResponse(c, await controller.selectAndGenerate(parsed.data.topic_ids));
  });

  pipeline.post('/cancel', async (c) => {
    const result = await controller.cancel();
    if (!result.accepted) return commandResponse(c, result);
    return c.json({ status: 'cancelled', session_id: result.session_id }, 202);
  });

  pipeline.get('/status', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json(controller.status());
  });

  pipeline.get('/config/example', (c) => c.json(EXAMPLE_PIPELINE_CONFIG));

  // SSE stream. The first event is always a snapshot of the current session.
  pipeline.get('/events', (c) => {
    const log = c.get('log');
    return streamSSE(c, async (stream) => {
      const observer = controller.subscribe();
      const disconnect = () => controller.unsubscribe(observer);
      stream.onAbort(disconnect);

      const heartbeat = setInterval(() => {
        void stream.writeSSE({ event: 'heartbeat', data: '' }).catch(() => {
          log.debug('SSE heartbeat failed, dropping observer');
          clearInterval(heartbeat);
          disconnect();
        });
      }, options.heartbeatMs);
      heartbeat.unref();

      try {
        for await (const event of observer) {
          await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
        }
      } catch (err) {
        log.debug({ error: err instanceof Error ? err.message : String(err) }, 'SSE write failed, dropping observer');
      } finally {
        clearInterval(heartbeat);
        disconnect();
      }
    });
  });

  return pipeline;
}
