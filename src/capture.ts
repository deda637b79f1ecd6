import express, { Response } from 'express';
import cors from 'cors';
import http from 'node:http';
import { NetlogConfig } from './config.js';
import { CapturedExchange, createPathMatcher, entryFromExchange, normalizeHeaders } from './exchange.js';
import { LogList, LogStore } from './log-store.js';

export interface CaptureServer {
  server: http.Server;
  baseUrl: string;
  store: LogStore;
  close: () => Promise<void>;
}

const HOP_HEADERS = ['host', 'content-length', 'connection'];
const SKIPPED_RESPONSE_HEADERS = [
  'content-length',
  'content-encoding',
  'transfer-encoding',
  'connection',
  'keep-alive',
  'set-cookie'
];

function ensureTrailingSlash(value: string): string {
  return value.endsWith('/') ? value : `${value}/`;
}

export function buildTargetUrl(base: string, originalUrl: string): string {
  const baseUrl = new URL(ensureTrailingSlash(base));
  const relative = originalUrl.startsWith('/') ? originalUrl.slice(1) : originalUrl;
  return new URL(relative, baseUrl).toString();
}

function writeEvent(res: Response, logs: LogList) {
  const payload = JSON.stringify(logs.map((entry) => entry.toPayload()));
  res.write(`event: logs\ndata: ${payload}\n\n`);
}

export async function startCaptureServer(
  config: NetlogConfig,
  store = new LogStore({ maxEntries: config.maxEntries })
): Promise<CaptureServer> {
  if (!URL.canParse(config.target)) {
    throw new Error(`Invalid target URL: ${config.target}`);
  }
  const matcher = createPathMatcher(config.include);
  const streams = new Set<Response>();

  // CORS only covers the inspection endpoints; preflights to other paths go to the target.
  const inspection = cors();

  const app = express();

  app.get(config.endpoints.health, inspection, (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.options([config.endpoints.logs, config.endpoints.stream], inspection);

  app.get(config.endpoints.logs, inspection, (_req, res) => {
    res.json({ logs: store.currentLogs().map((entry) => entry.toPayload()) });
  });

  app.delete(config.endpoints.logs, inspection, (_req, res) => {
    store.clearLogs();
    res.status(204).end();
  });

  app.get(config.endpoints.stream, inspection, (_req, res) => {
    res.status(200);
    res.setHeader('content-type', 'text/event-stream');
    res.setHeader('cache-control', 'no-cache');
    res.setHeader('connection', 'keep-alive');
    res.flushHeaders();

    streams.add(res);
    writeEvent(res, store.currentLogs());
    const unsubscribe = store.subscribe((logs) => writeEvent(res, logs));
    res.on('close', () => {
      unsubscribe();
      streams.delete(res);
    });
  });

  app.use(express.raw({ type: '*/*', limit: '20mb' }));

  app.all('*', async (req, res) => {
    const start = Date.now();
    const targetUrl = buildTargetUrl(config.target, req.originalUrl);
    const method = req.method.toUpperCase();
    const requestHeaders = normalizeHeaders(req.headers);
    const bodyBuffer = req.body instanceof Buffer ? req.body : Buffer.from('');

    const headers = new Headers();
    for (const [key, value] of Object.entries(requestHeaders)) {
      if (HOP_HEADERS.includes(key.toLowerCase())) continue;
      headers.set(key, value);
    }

    const exchange: CapturedExchange = {
      request: { method, url: targetUrl, headers: requestHeaders, body: bodyBuffer },
      latency: 0
    };

    try {
      const hasBody = !['GET', 'HEAD'].includes(method);
      const response = await fetch(targetUrl, {
        method,
        headers,
        body: hasBody ? bodyBuffer : undefined
      });

      const responseBuffer = Buffer.from(await response.arrayBuffer());
      response.headers.forEach((value, key) => {
        if (SKIPPED_RESPONSE_HEADERS.includes(key.toLowerCase())) return;
        res.setHeader(key, value);
      });
      const cookies = response.headers.getSetCookie();
      if (cookies.length > 0) {
        res.setHeader('set-cookie', cookies);
      }
      res.status(response.status).send(responseBuffer);
      exchange.response = { status: response.status, statusText: response.statusText, body: responseBuffer };
    } catch (error) {
      exchange.error = error instanceof Error ? error.message : String(error);
      if (!res.headersSent) {
        res.status(502).json({ error: 'Proxy request failed', message: exchange.error });
      }
    }

    exchange.latency = Date.now() - start;
    const status = exchange.response?.status;
    const statusAllowed = !config.statusFilter || status === undefined || config.statusFilter.includes(status);
    if (matcher(req.path) && statusAllowed) {
      store.addLog(entryFromExchange(exchange));
    }
  });

  const server = http.createServer(app);

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host, () => resolve());
  });

  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : config.port;
  const baseUrl = `http://${config.host}:${port}`;

  return {
    server,
    baseUrl,
    store,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const res of streams) {
          res.end();
        }
        streams.clear();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
