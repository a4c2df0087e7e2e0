import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { errorMessage } from './events/errors.js';
import { LogLevelSchema, logger } from './logger.js';
import { parseFlag } from './utils.js';

export const EmitErrorPolicySchema = z.enum(['throw', 'report']);

export const BenchConfigSchema = z.object({
  sizes: z.array(z.number().int().positive()).min(1).default([10, 100, 1000]),
  runs: z.number().int().positive().default(100),
});
export type BenchConfig = z.infer<typeof BenchConfigSchema>;

export const EventsConfigSchema = z.object({
  // What an emitter does when a receiver callback throws: rethrow after the
  // emission completes ('throw') or log and carry on ('report').
  error_policy: EmitErrorPolicySchema.default('throw'),
  log_level: LogLevelSchema.default('info'),
  // Log connect/disconnect/destroy at debug level.
  trace: z.boolean().default(false),
  bench: BenchConfigSchema.default({}),
});
export type EventsConfig = z.infer<typeof EventsConfigSchema>;

let activeConfig: EventsConfig = EventsConfigSchema.parse({});

export function getEventsConfig(): EventsConfig {
  return activeConfig;
}

/**
 * Make `config` the defaults for emitters created from now on.
 */
export function configureEvents(config: EventsConfig): void {
  activeConfig = config;
  logger.setLevel(config.log_level);
}

export function loadConfig(configPath: string): EventsConfig {
  logger.info(`Loading configuration from ${configPath}`);

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    // An empty file parses to null; treat it as "all defaults".
    const parsedYaml: unknown = yaml.parse(fileContents) ?? {};

    const config = EventsConfigSchema.parse(parsedYaml);

    logger.info('Configuration loaded and validated successfully.');
    return config;
  } catch (error) {
    logger.error(`Failed to load config: ${errorMessage(error)}`, { error });
    throw error;
  }
}

/**
 * Overlay `MULTICAST_*` environment variables on top of `config`.
 */
export function applyEnvOverrides(config: EventsConfig, env: NodeJS.ProcessEnv = process.env): EventsConfig {
  const next: EventsConfig = { ...config };

  const errorPolicy = env.MULTICAST_ERROR_POLICY?.trim();
  if (errorPolicy) next.error_policy = EmitErrorPolicySchema.parse(errorPolicy.toLowerCase());

  const logLevel = env.MULTICAST_LOG_LEVEL?.trim();
  if (logLevel) next.log_level = LogLevelSchema.parse(logLevel.toLowerCase());

  const trace = env.MULTICAST_TRACE;
  if (trace !== undefined && trace.trim() !== '') next.trace = parseFlag(trace);

  return next;
}
