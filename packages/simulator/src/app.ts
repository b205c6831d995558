import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { streamSSE } from 'hono/streaming';
import { describeError } from '@printlink/core';
import type { PrinterSimulator, SimulatorPayload } from './simulator';
import { errorHandler } from './middleware/error';

export interface SimulatorAppOptions {
  /** When false `/status/stream` answers 404, like a polling-only backend. */
  streaming?: boolean;
  logRequests?: boolean;
}

export function createSimulatorApp(sim: PrinterSimulator, options: SimulatorAppOptions = {}): Hono {
  const streaming = options.streaming ?? true;
  const app = new Hono();

  // Middleware
  app.use('*', cors());
  if (options.logRequests) {
    app.use('*', logger());
  }
  app.use('*', async (c, next) => {
    if (!sim.isOnline() && c.req.path !== '/health') {
      return c.json({ error: { code: 'OFFLINE', message: 'Device is offline' } }, 503);
    }
    await next();
  });
  app.onError(errorHandler);

  app.get('/status', (c) => c.json(sim.toPayload()));

  app.get('/status/stream', (c) => {
    if (!streaming) {
      return c.json({ error: { code: 'NOT_SUPPORTED', message: 'Streaming is not supported' } }, 404);
    }

    return streamSSE(c, async (stream) => {
      let finish: () => void = () => undefined;
      const ended = new Promise<void>((resolve) => {
        finish = resolve;
      });

      const send = (payload: SimulatorPayload) => {
        stream.writeSSE({ data: JSON.stringify(payload) }).catch((error: unknown) => {
          console.warn('Failed to push status event:', describeError(error));
          finish();
        });
      };

      sim.on('change', send);
      sim.once('disconnect', finish);
      stream.onAbort(finish);

      try {
        await stream.writeSSE({ data: JSON.stringify(sim.toPayload()) });
        await ended;
      } finally {
        sim.off('change', send);
        sim.off('disconnect', finish);
      }
    });
  });

  app.post('/pause', (c) => {
    sim.pause();
    return c.json({ success: true });
  });

  app.post('/resume', (c) => {
    sim.resume();
    return c.json({ success: true });
  });

  app.post('/cancel', (c) => {
    sim.cancel();
    return c.json({ success: true });
  });

  app.post('/start', (c) => {
    const path = c.req.query('path');
    if (!path) {
      return c.json({ error: { code: 'BAD_REQUEST', message: 'path is required' } }, 400);
    }
    sim.start(path, { location: c.req.query('location') });
    return c.json({ success: true, job: sim.getJob() });
  });

  app.get('/thumbnail', (c) => {
    const location = c.req.query('location') ?? 'Local';
    const path = c.req.query('path') ?? '';
    const size = c.req.query('size') ?? 'Large';
    const bytes = sim.thumbnail(location, path, size);
    if (!bytes) {
      return c.body(null, 204);
    }
    return new Response(bytes, { status: 200, headers: { 'Content-Type': 'image/png' } });
  });

  app.get('/health', (c) => c.json({ status: 'ok', online: sim.isOnline() }));

  return app;
}
