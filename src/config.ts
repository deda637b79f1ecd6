import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

export interface NetlogConfig {
  /** Base URL of the API the proxy forwards to. */
  target: string;
  host: string;
  port: number;
  /** Only log paths matching this substring, or `/regex/`. */
  include?: string;
  /** Only log responses with one of these status codes. */
  statusFilter?: number[];
  maxEntries?: number;
  print: boolean;
  endpoints: {
    health: string;
    logs: string;
    stream: string;
  };
}

const defaultConfig: NetlogConfig = {
  target: '',
  host: '127.0.0.1',
  port: 3005,
  print: false,
  endpoints: {
    health: '/health',
    logs: '/__netlog__/logs',
    stream: '/__netlog__/stream'
  }
};

export type PartialDeep<T> = {
  [K in keyof T]?: T[K] extends object ? PartialDeep<T[K]> : T[K];
};

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = base[key];
    if (isObject(baseValue) && isObject(value)) {
      result[key] = deepMerge(baseValue, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

async function loadConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Config file not found: ${resolved}`);
  }
  const fileUrl = pathToFileURL(resolved).href;
  const imported: unknown = await import(fileUrl);
  const config = isObject(imported) && imported.default !== undefined ? imported.default : imported;
  if (!isObject(config)) {
    throw new Error('Config file must export an object.');
  }
  return config;
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function toConfig(merged: Record<string, unknown>): NetlogConfig {
  const endpoints = isObject(merged.endpoints) ? merged.endpoints : {};
  const statusFilter = Array.isArray(merged.statusFilter)
    ? merged.statusFilter.filter((code): code is number => typeof code === 'number')
    : undefined;

  return {
    target: readString(merged, 'target', defaultConfig.target),
    host: readString(merged, 'host', defaultConfig.host),
    port: coerceNumber(merged.port, defaultConfig.port) ?? defaultConfig.port,
    include: typeof merged.include === 'string' ? merged.include : undefined,
    statusFilter: statusFilter && statusFilter.length > 0 ? statusFilter : undefined,
    maxEntries: coerceNumber(merged.maxEntries, undefined),
    print: merged.print === true,
    endpoints: {
      health: readString(endpoints, 'health', defaultConfig.endpoints.health),
      logs: readString(endpoints, 'logs', defaultConfig.endpoints.logs),
      stream: readString(endpoints, 'stream', defaultConfig.endpoints.stream)
    }
  };
}

export async function loadConfig(
  configPath?: string,
  overrides: PartialDeep<NetlogConfig> = {}
): Promise<NetlogConfig> {
  let fileConfig: Record<string, unknown> = {};
  const defaultConfigPath = path.resolve('netlog.config.js');

  if (configPath) {
    fileConfig = await loadConfigFile(configPath);
  } else if (fs.existsSync(defaultConfigPath)) {
    fileConfig = await loadConfigFile(defaultConfigPath);
  }

  let merged = deepMerge(toRecord(defaultConfig), fileConfig);
  merged = deepMerge(merged, toRecord(overrides));
  const config = toConfig(merged);

  if (!config.target) {
    throw new Error('Target URL is required. Provide --target or set `target` in config.');
  }

  return config;
}

export function coerceNumber(value: unknown, fallback?: number): number | undefined {
  if (value === undefined || value === null || value === '') return fallback;
  const num = Number(value);
  if (Number.isNaN(num)) return fallback;
  return num;
}
