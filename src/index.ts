export { LogEntry } from './log-entry.js';
export type { LogEntryFields, LogEntryJson, LogEntryPayload } from './log-entry.js';
export { LogStore, logStore } from './log-store.js';
export type { LogList, LogStoreOptions } from './log-store.js';
export { Notifier } from './notifier.js';
export type { Listener } from './notifier.js';
export { buildCurl, shellQuote } from './curl.js';
export type { CurlRequest } from './curl.js';
export { entryFromExchange, normalizeHeaders, decodeBodyText, createPathMatcher, parseStatusList } from './exchange.js';
export type { CapturedExchange } from './exchange.js';
export { startCaptureServer, buildTargetUrl } from './capture.js';
export type { CaptureServer } from './capture.js';
export { loadConfig, coerceNumber } from './config.js';
export type { NetlogConfig } from './config.js';
