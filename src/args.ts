import * as fs from 'fs';
import * as path from 'path';
import { EventsConfigSchema, applyEnvOverrides, loadConfig, type EventsConfig } from './config.js';
import { LogLevelSchema, type LogLevel } from './logger.js';
import { parsePositiveIntList } from './utils.js';

export const DEFAULT_CONFIG_FILE = 'multicast.yaml';

export interface CliArgs {
  configFile?: string;
  sizes?: number[];
  runs?: number;
  logLevel?: LogLevel;
  trace: boolean;
  quiet: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  let sizes: number[] | undefined;
  let runs: number | undefined;
  let logLevel: LogLevel | undefined;
  let trace = false;
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    // npm forwards a literal `--` when run as `npm run bench -- --runs 10`.
    if (arg === '--') continue;

    if (arg === '--trace') {
      trace = true;
      continue;
    }

    if (arg === '--quiet' || arg === '-q') {
      quiet = true;
      continue;
    }

    if (arg === '--sizes') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --sizes');
      sizes = parsePositiveIntList(next);
      i++;
      continue;
    }

    if (arg === '--runs') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --runs');
      const n = Number(next);
      if (!Number.isInteger(n) || n <= 0) throw new Error(`Invalid run count "${next}" for --runs`);
      runs = n;
      i++;
      continue;
    }

    if (arg === '--log-level') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --log-level');
      const parsed = LogLevelSchema.safeParse(next.toLowerCase());
      if (!parsed.success) throw new Error(`Invalid log level "${next}" for --log-level`);
      logLevel = parsed.data;
      i++;
      continue;
    }

    if (arg === '--config') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --config');
      configFile = next;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return { configFile, sizes, runs, logLevel, trace, quiet };
}

function loadRunConfigFile(configFile: string | undefined, cwd: string): EventsConfig {
  if (configFile) return loadConfig(path.resolve(cwd, configFile));

  const fallback = path.resolve(cwd, DEFAULT_CONFIG_FILE);
  if (fs.existsSync(fallback)) return loadConfig(fallback);

  return EventsConfigSchema.parse({});
}

/**
 * Merge the run configuration: config file (or `multicast.yaml` in `cwd`), then
 * `MULTICAST_*` variables, then command line flags.
 *
 * `--trace` lowers the log level to `debug` unless a level was given through
 * `--log-level` or `MULTICAST_LOG_LEVEL`, since trace lines are debug entries.
 */
export function resolveRunConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): EventsConfig {
  const config = applyEnvOverrides(loadRunConfigFile(args.configFile, cwd), env);

  if (args.trace) {
    config.trace = true;
    const levelIsExplicit = args.logLevel !== undefined || Boolean(env.MULTICAST_LOG_LEVEL?.trim());
    if (!levelIsExplicit) config.log_level = 'debug';
  }
  if (args.logLevel) config.log_level = args.logLevel;

  return {
    ...config,
    bench: {
      sizes: args.sizes ?? config.bench.sizes,
      runs: args.runs ?? config.bench.runs,
    },
  };
}
