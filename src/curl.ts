export interface CurlRequest {
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: string | null;
}

const SKIPPED_HEADERS = ['host', 'content-length', 'connection'];

/**
 * Quotes a value for a POSIX shell.
 *
 * @example
 * shellQuote("it's") // => 'it'\''s'
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function buildCurl(request: CurlRequest): string {
  const parts = ['curl', '-X', request.method.toUpperCase(), shellQuote(request.url)];
  for (const [name, value] of Object.entries(request.headers ?? {})) {
    if (SKIPPED_HEADERS.includes(name.toLowerCase())) continue;
    parts.push('-H', shellQuote(`${name}: ${value}`));
  }
  if (request.body) {
    parts.push('--data', shellQuote(request.body));
  }
  return parts.join(' ');
}
