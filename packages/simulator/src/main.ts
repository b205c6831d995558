import { serve } from '@hono/node-server';
import { createLogger, describeError } from '@printlink/core';
import { PrinterSimulator } from './simulator';
import { createSimulatorApp } from './app';

const log = createLogger('simulator');

const port = parseInt(process.env.PORT || '12357', 10);
const tickMs = parseInt(process.env.TICK_MS || '2000', 10);
const streaming = process.env.STREAMING !== 'false';
const demoJob = process.env.DEMO_JOB;

const sim = new PrinterSimulator({ latchedTransitions: true });
const app = createSimulatorApp(sim, { streaming, logRequests: true });

if (demoJob) {
  sim.start(demoJob);
}

const timer = setInterval(() => sim.tick(tickMs / 1000), tickMs);

const server = serve({ fetch: app.fetch, port }, (info) => {
  console.log(`
╔════════════════════════════════════════════════════╗
║     PrintLink printer simulator                    ║
║     Listening on http://localhost:${info.port}            ║
╚════════════════════════════════════════════════════╝
`);
  log.info(`Streaming ${streaming ? 'enabled' : 'disabled'}, one layer every ${tickMs}ms`);
});

function shutdown(): void {
  clearInterval(timer);
  sim.dropStreams();
  server.close((error) => {
    if (error) {
      log.error('Failed to close server', describeError(error));
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
