import { parentPort } from 'node:worker_threads';
import { answerLayoutRequest } from './protocol.js';

const port = parentPort;
if (!port) {
  throw new Error('layout-worker must be started as a worker thread');
}

port.on('message', (message: unknown) => {
  const reply = answerLayoutRequest(message);
  if (reply) port.postMessage(reply);
});
