import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { hostname } from 'node:os';
import { resolve } from 'node:path';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Agent configuration as written in `config.json`.
 *
 * Keys are snake_case and intervals are in seconds so that existing
 * agent installations keep working with their config files.
 */
export const configFileSchema = z.object({
  server_url: z.string().url(),
  retry_interval: z.number().positive(),
  check_interval: z.number().positive(),
  max_retries: z.number().int().min(1).max(20),
  log_level: z
    .string()
    .transform((level) => level.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
  batch_size: z.number().int().min(1).max(1000),
  process_all_on_start: z.boolean(),
  lookback_minutes: z.number().positive(),
  request_timeout: z.number().positive(),
  state_file: z.string().min(1),
  log_file: z.string().min(1).nullable(),
  host: z.string().min(1).nullable(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Values written to a fresh `config.json`. */
export const DEFAULT_CONFIG_FILE: ConfigFile = {
  server_url: 'http://localhost:5002/api/print_events',
  retry_interval: 30,
  check_interval: 5,
  max_retries: 3,
  log_level: 'info',
  batch_size: 50,
  process_all_on_start: true,
  lookback_minutes: 5,
  request_timeout: 30,
  state_file: 'processed_events.json',
  log_file: null,
  host: null,
};

/** Resolved runtime configuration handed to the agent. */
export interface AgentConfig {
  readonly collectorUrl: string;
  /** Name under which this machine's events are identified. */
  readonly host: string;
  readonly checkIntervalMs: number;
  readonly retryIntervalMs: number;
  readonly lookbackMs: number;
  readonly requestTimeoutMs: number;
  readonly maxRetries: number;
  readonly batchSize: number;
  readonly catchUpOnStart: boolean;
  readonly stateFile: string;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Defaults to `$SPOOLWATCH_CONFIG`, then `./config.json`. */
  configPath?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  /** Write a default file when none exists. */
  createIfMissing?: boolean | undefined;
}

function readConfigFile(filePath: string, createIfMissing: boolean): Record<string, unknown> {
  if (!existsSync(filePath)) {
    if (createIfMissing) {
      writeFileSync(filePath, `${JSON.stringify(DEFAULT_CONFIG_FILE, null, 4)}\n`, 'utf-8');
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${filePath}`, [reason]);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Loads agent configuration.
 *
 * Missing keys get default values, so partial files from older agents
 * are accepted. `COLLECTOR_URL` and `LOG_LEVEL` override the file.
 * Invalid values raise a ConfigError listing every offending key.
 */
export function loadAgentConfig(opts: LoadConfigOptions = {}): AgentConfig {
  const env = opts.env ?? process.env;
  const filePath = resolve(opts.configPath ?? env['SPOOLWATCH_CONFIG'] ?? 'config.json');

  const fromFile = readConfigFile(filePath, opts.createIfMissing ?? false);

  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG_FILE, ...fromFile };
  if (env['COLLECTOR_URL']) merged['server_url'] = env['COLLECTOR_URL'];
  if (env['LOG_LEVEL']) merged['log_level'] = env['LOG_LEVEL'];

  const parsed = configFileSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration in ${filePath}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const file = parsed.data;
  return {
    collectorUrl: file.server_url,
    host: file.host ?? hostname(),
    checkIntervalMs: file.check_interval * 1000,
    retryIntervalMs: file.retry_interval * 1000,
    lookbackMs: file.lookback_minutes * 60_000,
    requestTimeoutMs: file.request_timeout * 1000,
    maxRetries: file.max_retries,
    batchSize: file.batch_size,
    catchUpOnStart: file.process_all_on_start,
    stateFile: file.state_file,
    logLevel: file.log_level,
    logFile: file.log_file,
  };
}
