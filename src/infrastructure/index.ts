export { loadAgentConfig, configFileSchema, DEFAULT_CONFIG_FILE, ConfigError } from './config/config.js';
export type { AgentConfig, ConfigFile, LogLevel, LoadConfigOptions } from './config/config.js';
export { createLogger } from './logger.js';
export { JsonStateFile, persistedStateSchema } from './state/state-file.js';
export { CollectorSender } from './collector/sender.js';
export type { CollectorSenderOptions } from './collector/sender.js';
export {
  PowerShellEventSource,
  runPowerShell,
  buildQueryScript,
  parseEventLines,
  winEventRecordSchema,
} from './source/powershell-source.js';
export type { ScriptRunner, PowerShellEventSourceOptions, ParsedOutput } from './source/powershell-source.js';
