#!/usr/bin/env node
import { resolve } from 'node:path';
import { Agent, DedupStore, SourceUnavailableError } from './application/index.js';
import {
  CollectorSender,
  ConfigError,
  JsonStateFile,
  PowerShellEventSource,
  createLogger,
  loadAgentConfig,
} from './infrastructure/index.js';

/**
 * Print-audit agent process.
 *
 * Reads `config.json` (created with defaults on first run), replays the
 * print log history if configured, then polls for new jobs until SIGINT
 * or SIGTERM. Shutdown waits for the current tick, makes one last
 * delivery attempt and saves the ledger.
 */
async function main(): Promise<void> {
  const config = loadAgentConfig({ createIfMissing: true });
  const log = createLogger(config.logLevel, config.logFile);

  const store = new DedupStore({
    localHost: config.host,
    repository: new JsonStateFile(resolve(config.stateFile)),
    log,
  });
  const sender = new CollectorSender({
    url: config.collectorUrl,
    log,
    maxRetries: config.maxRetries,
    timeoutMs: config.requestTimeoutMs,
  });
  const source = new PowerShellEventSource({ log });
  const agent = new Agent({ config, source, sender, store, log });

  const ac = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    if (ac.signal.aborted) return;
    log.info({ signal }, 'Shutdown requested, finishing current tick');
    ac.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await agent.run(ac.signal);
  } catch (err: unknown) {
    if (err instanceof SourceUnavailableError) {
      log.fatal({ err }, 'Cannot read the print event log; the agent needs Windows with PowerShell');
    } else {
      log.fatal({ err }, 'Agent crashed');
    }
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start print agent:', err instanceof ConfigError ? err.message : err);
  process.exit(1);
});
