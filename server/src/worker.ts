import { loadConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { captureError, flushSentry, initSentry } from './lib/sentry.js';
import { createServices } from './lib/services.js';
import { ResumeWorker } from './queue/worker.js';

initSentry();
const config = loadConfig();
const services = createServices(config);
const worker = new ResumeWorker(services.queue, services.pipeline, { queueName: config.queueName });

let stopping = false;

async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, 'Worker shutdown initiated; finishing in-flight job');

  // A BRPOP in progress holds for up to the dequeue timeout before the loop notices.
  await worker.stop();
  await services.close();
  await flushSentry(2000);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err: unknown) => {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Worker shutdown failed');
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
process.on('unhandledRejection', (reason) => {
  captureError(reason, { source: 'unhandledRejection' });
  logger.error({ reason }, 'Unhandled promise rejection');
});

worker.start().catch((err: unknown) => {
  captureError(err, { source: 'worker_loop' });
  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Worker loop crashed');
  process.exit(1);
});
