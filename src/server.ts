import http from 'http';
import { z } from 'zod';
import type { CycleOrchestrator } from './engine/orchestrator';
import { NotFoundError, errorMessage } from './errors';
import { createLogger } from './logger';
import type { EventBus } from './notifications/eventBus';
import type { TradeStore } from './persistence/types';

const logger = createLogger('http');

const MAX_BODY_BYTES = 16 * 1024;

const strategyPatchSchema = z
  .object({
    weight: z.number().min(0).max(1).optional(),
    enabled: z.boolean().optional(),
  })
  .strict();

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readJson(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let raw = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      raw += chunk;
      if (raw.length > MAX_BODY_BYTES) {
        reject(new HttpError(413, 'request body too large'));
        req.destroy();
      }
    });
    req.on('end', () => {
      if (!raw) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch {
        reject(new HttpError(400, 'invalid JSON body'));
      }
    });
    req.on('error', reject);
  });
}

function streamEvents(req: http.IncomingMessage, res: http.ServerResponse, bus: EventBus): void {
  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
  });
  res.write(': connected\n\n');
  const unsubscribe = bus.subscribe((event) => {
    res.write(`event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
  });
  req.on('close', unsubscribe);
}

/** Read-only status plus operator controls. No authentication. */
export function createServer(engine: CycleOrchestrator, store: TradeStore, bus: EventBus): http.Server {
  const route = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname;

    if (req.method === 'GET') {
      if (path === '/health') return sendJson(res, 200, { ok: true });
      if (path === '/status') return sendJson(res, 200, engine.status());
      if (path === '/positions') return sendJson(res, 200, { rows: engine.status().openPositions });
      if (path === '/trades') {
        const limit = Math.min(Math.max(Number(url.searchParams.get('limit') ?? 50) || 50, 1), 500);
        return sendJson(res, 200, { rows: await store.recentTrades(limit) });
      }
      if (path === '/events') return streamEvents(req, res, bus);
    }

    if (req.method === 'POST') {
      const control = /^\/control\/([a-z-]+)$/.exec(path);
      if (control) {
        switch (control[1]) {
          case 'pause':
            engine.pause();
            break;
          case 'resume':
            engine.resume();
            break;
          case 'close-all':
            engine.closeAll();
            break;
          case 'reset-kill-switch':
            await engine.resetKillSwitch();
            break;
          default:
            throw new HttpError(404, `unknown control ${control[1]}`);
        }
        logger.info({ command: control[1] }, 'operator command accepted');
        return sendJson(res, 202, { accepted: control[1] });
      }

      const strategy = /^\/strategies\/([^/]+)$/.exec(path);
      if (strategy) {
        const name = decodeURIComponent(strategy[1]);
        const parsed = strategyPatchSchema.safeParse(await readJson(req));
        if (!parsed.success) throw new HttpError(400, parsed.error.issues.map((i) => i.message).join('; '));
        const { weight, enabled } = parsed.data;
        if (weight !== undefined) engine.setStrategyWeight(name, weight);
        if (enabled === true) engine.enableStrategy(name);
        if (enabled === false) engine.disableStrategy(name);
        const info = engine.status().strategies.find((s) => s.name === name);
        return sendJson(res, 200, info ?? { name });
      }
    }

    throw new HttpError(404, 'not found');
  };

  return http.createServer((req, res) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }
    route(req, res).catch((err: unknown) => {
      const status = err instanceof HttpError ? err.status : err instanceof NotFoundError ? 404 : 500;
      if (status === 500) logger.error({ err, url: req.url }, 'request failed');
      if (!res.headersSent) sendJson(res, status, { error: errorMessage(err) });
      else res.end();
    });
  });
}
