#!/usr/bin/env node
import { Command } from 'commander';
import { coerceNumber, loadConfig, NetlogConfig, PartialDeep } from './config.js';
import { startCaptureServer } from './capture.js';
import { parseStatusList } from './exchange.js';

interface CaptureOptions {
  target?: string;
  port?: string;
  host?: string;
  config?: string;
  include?: string;
  status?: string;
  maxEntries?: string;
  print?: boolean;
}

const program = new Command();

program
  .name('netlog')
  .description('HTTP request/response log for debugging overlays');

program
  .command('capture')
  .description('Proxy a target API and keep a live log of every exchange')
  .option('-t, --target <url>', 'Target API base URL')
  .option('-p, --port <number>', 'Port to run the proxy on')
  .option('--host <host>', 'Host to bind to')
  .option('-c, --config <path>', 'Path to config file')
  .option('--include <pattern>', 'Only log paths matching substring or /regex/')
  .option('--status <codes>', 'Only log responses with status codes (comma-separated)')
  .option('--max-entries <number>', 'Keep only the newest N entries')
  .option('--print', 'Print every captured entry to the console')
  .action(async (options: CaptureOptions) => {
    const overrides: PartialDeep<NetlogConfig> = {};

    if (options.target) overrides.target = options.target;
    if (options.port) overrides.port = coerceNumber(options.port, undefined);
    if (options.host) overrides.host = options.host;
    if (options.include) overrides.include = options.include;
    if (options.status) overrides.statusFilter = parseStatusList(options.status);
    if (options.maxEntries) overrides.maxEntries = coerceNumber(options.maxEntries, undefined);
    if (options.print) overrides.print = true;

    const config = await loadConfig(options.config, overrides);
    const capture = await startCaptureServer(config);

    if (config.print) {
      capture.store.subscribe((logs) => {
        const [latest] = logs;
        if (latest) console.log(latest.toString());
      });
    }

    console.log('\nnetlog capture');
    console.log(`Target: ${config.target}`);
    console.log(`Proxy:  ${capture.baseUrl}`);
    console.log(`Logs:   ${capture.baseUrl}${config.endpoints.logs}`);
    console.log(`Stream: ${capture.baseUrl}${config.endpoints.stream}`);
    console.log('');
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
