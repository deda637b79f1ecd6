export interface LogEntryFields {
  /** Request method, e.g. `GET` or `POST`. */
  requestType?: string | null;
  /** Summary of the response, usually the status code. */
  response?: string | null;
  queryParameter?: string | null;
  header?: string | null;
  /** Body sent with the request. */
  requestData?: string | null;
  /** Body returned by the server. */
  responseData?: string | null;
  path?: string | null;
  message?: string | null;
  /** The request as a cURL command line, for replaying it in a terminal. */
  curl?: string | null;
}

export type LogEntryPayload = Record<string, unknown>;

export type LogEntryJson = {
  type: string | null;
  response: string | null;
  queryparameter: string | null;
  header: string | null;
  data: string | null;
  response_data: string | null;
  path: string | null;
  message: string | null;
  curl: string | null;
};

const MISSING = '-';

function readField(payload: LogEntryPayload, key: string): string {
  const value = payload[key];
  if (value === undefined || value === null) return MISSING;
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * One captured request/response cycle. Instances are frozen and compare by
 * value, so they can be handed to any number of listeners.
 */
export class LogEntry {
  readonly requestType: string | null;
  readonly response: string | null;
  readonly queryParameter: string | null;
  readonly header: string | null;
  readonly requestData: string | null;
  readonly responseData: string | null;
  readonly path: string | null;
  readonly message: string | null;
  readonly curl: string | null;

  constructor(fields: LogEntryFields = {}) {
    this.requestType = fields.requestType ?? null;
    this.response = fields.response ?? null;
    this.queryParameter = fields.queryParameter ?? null;
    this.header = fields.header ?? null;
    this.requestData = fields.requestData ?? null;
    this.responseData = fields.responseData ?? null;
    this.path = fields.path ?? null;
    this.message = fields.message ?? null;
    this.curl = fields.curl ?? null;
    Object.freeze(this);
  }

  /**
   * Builds an entry from a loosely typed payload. Missing keys become `"-"`.
   * `path` is not read back, so it stays `null`.
   */
  static fromPayload(payload: LogEntryPayload): LogEntry {
    return new LogEntry({
      requestType: readField(payload, 'type'),
      response: readField(payload, 'response'),
      queryParameter: readField(payload, 'queryparameter'),
      header: readField(payload, 'header'),
      requestData: readField(payload, 'data'),
      responseData: readField(payload, 'response_data'),
      message: readField(payload, 'message'),
      curl: readField(payload, 'curl')
    });
  }

  toPayload(): LogEntryJson {
    return {
      type: this.requestType,
      response: this.response,
      queryparameter: this.queryParameter,
      header: this.header,
      data: this.requestData,
      response_data: this.responseData,
      path: this.path,
      message: this.message,
      curl: this.curl
    };
  }

  toJSON(): LogEntryJson {
    return this.toPayload();
  }

  /** Field values in comparison and display order. */
  props(): ReadonlyArray<string | null> {
    return [
      this.requestType,
      this.response,
      this.header,
      this.queryParameter,
      this.requestData,
      this.responseData,
      this.path,
      this.message,
      this.curl
    ];
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof LogEntry)) return false;
    const mine = this.props();
    const theirs = other.props();
    return mine.every((value, index) => value === theirs[index]);
  }

  hashCode(): number {
    let hash = 17;
    for (const value of this.props()) {
      const text = value === null ? '\u0000' : value;
      let fieldHash = 0;
      for (let i = 0; i < text.length; i += 1) {
        fieldHash = (Math.imul(fieldHash, 31) + text.charCodeAt(i)) | 0;
      }
      hash = (Math.imul(hash, 37) + fieldHash) | 0;
    }
    return hash;
  }

  toString(): string {
    return this.props()
      .map((value) => (value === null ? 'null' : value))
      .join(', ');
  }
}
