import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import { Bridge } from '../bridge.js';
import { loadConfig } from '../config/loader.js';
import type { BridgeConfigInput } from '../config/types.js';
import { LogLevel, log, parseLogLevel } from '../utils/logger.js';

interface BridgeCommandOptions {
  debug?: boolean;
  logLevel?: string;
  debounce?: number;
  ignore?: string[];
  config?: string;
}

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('expected a non-negative integer of milliseconds');
  }
  return parsed;
}

function toConfigOverrides(options: BridgeCommandOptions): BridgeConfigInput {
  const overrides: BridgeConfigInput = {};
  if (options.debounce !== undefined) overrides.debounceMs = options.debounce;
  if (options.ignore !== undefined) overrides.ignore = options.ignore;
  if (options.debug) {
    overrides.logLevel = 'debug';
  } else if (options.logLevel !== undefined) {
    overrides.logLevel = options.logLevel;
  }
  return overrides;
}

/**
 * Serve the protocol on stdin/stdout until the input closes. Resolves with
 * the process exit code.
 */
async function serve(options: BridgeCommandOptions): Promise<number> {
  const config = loadConfig({ configPath: options.config, overrides: toConfigOverrides(options) });
  log.setLevel(parseLogLevel(config.logLevel, LogLevel.WARN));
  log.debug('Starting bridge', { debounceMs: config.debounceMs, ignore: config.ignore });

  const bridge = new Bridge({ input: process.stdin, output: process.stdout, config });

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info('Received signal, shutting down', { signal });
    bridge.stop();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    const result = await bridge.run();
    return result.exitCode;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

export async function runCli(argv = process.argv): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name('unison-fsmonitor')
    .description('Filesystem monitor for Unison repeat=watch: speaks the fsmonitor protocol on stdin/stdout')
    .version(readPackageVersion())
    .option('--debug', 'log at debug level')
    .option('--log-level <level>', 'debug|info|warn|error|silent')
    .option('-d, --debounce <ms>', 'quiet period before a batch of changes is signalled', parseMilliseconds)
    .option('--ignore <glob...>', 'paths (relative to a root) never reported or watched')
    .option('-c, --config <path>', 'JSON config file (default: ~/.unison/fsmonitor.json)')
    .action(async (options: BridgeCommandOptions): Promise<void> => {
      exitCode = await serve(options);
    });

  await program.parseAsync(argv);
  return exitCode;
}
