import type { IncomingHttpHeaders } from 'node:http';
import { buildCurl } from './curl.js';
import { LogEntry } from './log-entry.js';

export interface CapturedExchange {
  request: {
    method: string;
    /** Absolute URL the request was forwarded to. */
    url: string;
    headers: Record<string, string>;
    body?: Buffer;
  };
  /** Absent when the target could not be reached. */
  response?: {
    status: number;
    statusText: string;
    body?: Buffer;
  };
  error?: string;
  latency: number;
}

export function normalizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      result[key] = value.join(', ');
    } else {
      result[key] = value;
    }
  }
  return result;
}

/** The body as text, or `null` when the bytes are not valid UTF-8. */
function readUtf8(buffer: Buffer): string | null {
  const text = buffer.toString('utf8');
  const reencoded = Buffer.from(text, 'utf8');
  const isUtf8 = reencoded.length === buffer.length && reencoded.equals(buffer) && !text.includes('\uFFFD');
  return isUtf8 ? text : null;
}

export function decodeBodyText(buffer?: Buffer): string | null {
  if (!buffer || buffer.length === 0) return null;
  return readUtf8(buffer) ?? `<binary ${buffer.length} bytes>`;
}

export function createPathMatcher(pattern?: string): (value: string) => boolean {
  if (!pattern) return () => true;
  if (pattern.startsWith('/') && pattern.endsWith('/') && pattern.length > 2) {
    const regex = new RegExp(pattern.slice(1, -1));
    return (value) => regex.test(value);
  }
  return (value) => value.includes(pattern);
}

export function parseStatusList(input?: string): number[] | undefined {
  if (!input) return undefined;
  const values = input
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => Number.parseInt(item, 10))
    .filter((num) => Number.isFinite(num));
  return values.length > 0 ? values : undefined;
}

function queryToText(url: URL): string | null {
  if (!url.search) return null;
  const query: Record<string, string | string[]> = {};
  for (const key of new Set(url.searchParams.keys())) {
    const values = url.searchParams.getAll(key);
    query[key] = values.length === 1 ? values[0] : values;
  }
  return JSON.stringify(query);
}

export function entryFromExchange(exchange: CapturedExchange): LogEntry {
  const { request, response } = exchange;
  const url = new URL(request.url);
  const requestData = decodeBodyText(request.body);

  let message: string | null = null;
  if (exchange.error !== undefined) {
    message = exchange.error;
  } else if (response) {
    message = `${response.statusText || response.status} in ${exchange.latency}ms`;
  }

  return new LogEntry({
    requestType: request.method.toUpperCase(),
    response: response ? String(response.status) : null,
    queryParameter: queryToText(url),
    header: JSON.stringify(request.headers),
    requestData,
    responseData: response ? decodeBodyText(response.body) : null,
    path: url.pathname,
    message,
    curl: buildCurl({
      method: request.method,
      url: request.url,
      headers: request.headers,
      // No --data for binary bodies.
      body: request.body && request.body.length > 0 ? readUtf8(request.body) : null
    })
  });
}
