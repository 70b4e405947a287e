import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';

import { decodeImage, type ImageToolOptions } from '../cli/utils/ffmpeg.js';
import { DEFAULT_CANVAS_SIZE, type CanvasSize } from '../projection/parameters.js';
import { createInlineExecutor, type RenderExecutor } from '../raster/executor.js';
import { createRasterWorkerPool } from '../raster/workerPool.js';
import { RenderWatchdog } from '../runtime/renderWatchdog.js';
import { RenderSession } from '../session/renderSession.js';
import { describeSessionEvent, parseLiveMessage, type LiveServerMessage } from './liveProtocol.js';
import { routeRequest } from './routes.js';
import { RequestError, isRecord, type JsonValue } from './requestFields.js';

const readJsonBody = async (req: IncomingMessage): Promise<JsonValue> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  if (chunks.length === 0) {
    return {};
  }
  const payload = Buffer.concat(chunks).toString('utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RequestError(`Invalid JSON payload: ${message}`);
  }
  if (!isRecord(parsed)) {
    throw new RequestError('JSON payload must be an object');
  }
  return parsed;
};

const writeJson = (res: ServerResponse, status: number, body: JsonValue) => {
  const payload = JSON.stringify(body, null, 2);
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Content-Length', Buffer.byteLength(payload, 'utf8'));
  res.end(payload);
};

export type ServerOptions = {
  port?: number;
  host?: string;
  /** Worker threads shared by every live session; 1 keeps rendering on the main thread. */
  workers?: number;
  canvas?: CanvasSize;
  io?: ImageToolOptions;
};

const sendLive = (socket: WebSocket, message: LiveServerMessage) => {
  socket.send(JSON.stringify(message));
};

const attachLiveSession = (
  socket: WebSocket,
  executor: RenderExecutor,
  options: ServerOptions,
) => {
  const session = new RenderSession({
    executor,
    canvasSize: options.canvas ?? DEFAULT_CANVAS_SIZE,
    watchdog: new RenderWatchdog({}, { label: 'live', historySize: 16 }),
  });
  session.subscribe((event) => {
    sendLive(socket, describeSessionEvent(event));
    if (event.kind === 'frame') {
      socket.send(event.frame.image.data);
    }
  });
  sendLive(socket, { kind: 'ready', canvas: session.canvasSize, parameters: session.parameters });

  const handle = async (data: RawData) => {
    const parsed = parseLiveMessage(data.toString());
    if (!parsed.ok) {
      sendLive(socket, { kind: 'error', message: parsed.error });
      return;
    }
    const { message } = parsed;
    if (message.kind === 'source') {
      const image = await decodeImage(message.path, options.io);
      await session.setSource(image);
    } else if (message.kind === 'params') {
      await session.updateParameters(message.patch);
    } else {
      await session.refresh();
    }
  };

  socket.on('message', (data) => {
    handle(data).catch((error: unknown) => {
      sendLive(socket, {
        kind: 'error',
        message: error instanceof Error ? error.message : String(error),
      });
    });
  });
  socket.on('close', () => {
    session.close();
    console.log('[live] client disconnected');
  });
};

export const startServer = (options: ServerOptions = {}) => {
  const port = options.port ?? 8787;
  const host = options.host ?? '127.0.0.1';
  const executor: RenderExecutor =
    (options.workers ?? 1) > 1
      ? createRasterWorkerPool({ size: options.workers })
      : createInlineExecutor();

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? `${host}:${port}`}`);
    const method = req.method ?? 'GET';
    const respond = async () => {
      const body = method === 'POST' ? await readJsonBody(req) : {};
      const response = await routeRequest(method, url.pathname, body, {
        workers: options.workers,
      });
      writeJson(res, response.status, response.body);
    };
    respond().catch((error: unknown) => {
      const status = error instanceof RequestError ? 400 : 500;
      if (status === 500) {
        console.error('[server] unexpected error', error);
      }
      if (!res.writableEnded) {
        writeJson(res, status, {
          status: 'error',
          message: error instanceof Error ? error.message : String(error),
        });
      }
    });
  });

  const live = new WebSocketServer({ server, path: '/live' });
  live.on('connection', (socket) => {
    console.log('[live] client connected');
    attachLiveSession(socket, executor, options);
  });

  server.listen(port, host, () => {
    console.log(`[server] listening on http://${host}:${port}`);
    console.log(`[live] preview channel at ws://${host}:${port}/live`);
  });

  const close = async () => {
    live.close();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await executor.close();
  };

  return { server, live, close };
};
