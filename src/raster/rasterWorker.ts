import { parentPort } from 'node:worker_threads';

import { projectionModelFromSnapshot } from '../projection/projectionModel.js';
import { rasterizeRows } from './rasterizer.js';
import { wrapRgbImage } from './rgbImage.js';
import { isBandTaskMessage, type BandReplyMessage } from './workerMessages.js';

if (!parentPort) {
  throw new Error('rasterWorker must be started as a worker thread');
}

const port = parentPort;

port.on('message', (message: unknown) => {
  if (!isBandTaskMessage(message)) {
    return;
  }
  let reply: BandReplyMessage;
  try {
    const source = wrapRgbImage(
      message.source.width,
      message.source.height,
      new Uint8Array(message.source.buffer),
    );
    const target = wrapRgbImage(
      message.target.width,
      message.target.height,
      new Uint8Array(message.target.buffer),
    );
    const model = projectionModelFromSnapshot(message.model);
    rasterizeRows(source, model, target, message.rowStart, message.rowEnd);
    reply = { kind: 'done', taskId: message.taskId };
  } catch (error) {
    reply = {
      kind: 'error',
      taskId: message.taskId,
      message: error instanceof Error ? error.message : String(error),
    };
  }
  port.postMessage(reply);
});
