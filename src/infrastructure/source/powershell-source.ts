import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { EventSource } from '../../application/ports.js';
import type { RawEvent } from '../../domain/index.js';

const execFileAsync = promisify(execFile);

const LOG_NAME = 'Microsoft-Windows-PrintService/Operational';
/** "Document printed" */
const EVENT_ID = 307;
const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;
const PROBE_OK = 'spoolwatch-ok';

/** Runs a PowerShell script and resolves with its stdout. */
export type ScriptRunner = (script: string) => Promise<string>;

export const runPowerShell: ScriptRunner = async (script) => {
  const { stdout } = await execFileAsync(
    'powershell',
    ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command', script],
    { encoding: 'utf8', maxBuffer: MAX_OUTPUT_BYTES, windowsHide: true },
  );
  return stdout;
};

/**
 * One event as emitted by the query script (`ConvertTo-Json -Compress`).
 * `Message` is null when Windows cannot render the message template.
 */
export const winEventRecordSchema = z
  .object({
    RecordId: z.number().int().nonnegative(),
    TimeCreated: z.string().min(1),
    MachineName: z.string().min(1),
    Message: z.string().nullish(),
    UserId: z.string().nullish(),
    Level: z.string().nullish(),
  })
  .transform(
    (record): RawEvent => ({
      sequence: record.RecordId,
      timestamp: record.TimeCreated,
      host: record.MachineName,
      message: record.Message ?? '',
    }),
  );

/**
 * Builds the Get-WinEvent query. Without `sinceSeconds` the whole log is
 * read. Output is one compressed JSON object per line, oldest first.
 */
export function buildQueryScript(sinceSeconds?: number): string {
  const startTime =
    sinceSeconds === undefined ? '' : `$filter.StartTime = (Get-Date).AddSeconds(-${Math.ceil(sinceSeconds)})`;

  return [
    '[Console]::OutputEncoding = [System.Text.Encoding]::UTF8',
    `$filter = @{ LogName = '${LOG_NAME}'; ID = ${EVENT_ID} }`,
    startTime,
    '$events = Get-WinEvent -FilterHashtable $filter -ErrorAction SilentlyContinue',
    '$events | Sort-Object RecordId | ForEach-Object {',
    '  [ordered]@{',
    '    RecordId = $_.RecordId',
    "    TimeCreated = $_.TimeCreated.ToString('yyyy-MM-dd HH:mm:ss')",
    '    UserId = if ($_.UserId) { $_.UserId.Value } else { $null }',
    '    MachineName = $_.MachineName',
    '    Message = $_.Message',
    '    Level = $_.LevelDisplayName',
    '  } | ConvertTo-Json -Compress',
    '}',
  ]
    .filter((line) => line !== '')
    .join('\n');
}

export interface ParsedOutput {
  events: RawEvent[];
  skipped: number;
}

/**
 * Parses script stdout. Lines that are not JSON objects (progress output,
 * warnings) are ignored; objects failing validation are counted as skipped.
 */
export function parseEventLines(stdout: string): ParsedOutput {
  const events: RawEvent[] = [];
  let skipped = 0;

  for (const rawLine of stdout.split('\n')) {
    const line = rawLine.trim();
    if (!line.startsWith('{')) continue;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      skipped++;
      continue;
    }

    const parsed = winEventRecordSchema.safeParse(json);
    if (parsed.success) {
      events.push(parsed.data);
    } else {
      skipped++;
    }
  }

  return { events, skipped };
}

export interface PowerShellEventSourceOptions {
  log: Logger;
  runner?: ScriptRunner | undefined;
}

/**
 * EventSource over the Windows PrintService operational log.
 *
 * Fetch failures are logged and reported as an empty result; the agent
 * loop simply tries again on its next tick.
 */
export class PowerShellEventSource implements EventSource {
  private readonly log: Logger;
  private readonly runner: ScriptRunner;

  constructor(opts: PowerShellEventSourceOptions) {
    this.log = opts.log;
    this.runner = opts.runner ?? runPowerShell;
  }

  async isAvailable(): Promise<boolean> {
    const script = `if (Get-WinEvent -ListLog '${LOG_NAME}' -ErrorAction SilentlyContinue) { '${PROBE_OK}' }`;
    try {
      const stdout = await this.runner(script);
      const ok = stdout.trim() === PROBE_OK;
      if (!ok) this.log.error({ log: LOG_NAME }, 'Print event log not found');
      return ok;
    } catch (err: unknown) {
      this.log.error({ err }, 'PowerShell is not available');
      return false;
    }
  }

  async fetchAll(): Promise<RawEvent[]> {
    this.log.info({ log: LOG_NAME, eventId: EVENT_ID }, 'Reading full print event history');
    const events = await this.query(buildQueryScript());
    this.log.info({ count: events.length }, 'Print event history loaded');
    return events;
  }

  async fetchSince(windowMs: number): Promise<RawEvent[]> {
    return this.query(buildQueryScript(windowMs / 1000));
  }

  private async query(script: string): Promise<RawEvent[]> {
    try {
      const stdout = await this.runner(script);
      const { events, skipped } = parseEventLines(stdout);
      if (skipped > 0) {
        this.log.warn({ skipped }, 'Ignored malformed print event records');
      }
      return events;
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to query print event log');
      return [];
    }
  }
}
