import pino from 'pino';
import type { Level, Logger } from 'pino';
import type { LogLevel } from './config/config.js';

/**
 * Creates the agent's pino logger.
 *
 * Always logs to stdout; with `logFile` set, the same records are also
 * appended to that file.
 */
export function createLogger(level: LogLevel, logFile: string | null): Logger {
  if (logFile === null) {
    return pino({ level });
  }

  const streamLevel: Level = level === 'silent' ? 'fatal' : level;
  return pino(
    { level },
    pino.multistream([
      { level: streamLevel, stream: process.stdout },
      { level: streamLevel, stream: pino.destination({ dest: logFile, mkdir: true, sync: true }) },
    ]),
  );
}
