import { readFile, rename, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { StateRepository } from '../../application/ports.js';
import type { PersistedState } from '../../domain/index.js';

/**
 * Zod schema for `processed_events.json`.
 *
 * Only `processed_ids` is required: files written by early agent versions
 * carry bare integers and none of the metadata fields.
 */
export const persistedStateSchema = z.object({
  processed_ids: z.array(z.union([z.string(), z.number()])),
  last_update: z.string().default(''),
  highest_id_this_machine: z.number().int().nonnegative().default(0),
  total_processed: z.number().int().nonnegative().default(0),
  stats_by_machine: z.record(z.string(), z.number()).default({}),
  compaction_floors: z.record(z.string(), z.number().int().nonnegative()).default({}),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * JSON file ledger.
 *
 * Saves go through a temporary sibling file and a rename, so a crash
 * mid-write leaves the previous ledger intact.
 */
export class JsonStateFile implements StateRepository {
  constructor(private readonly filePath: string) {}

  async load(): Promise<PersistedState | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    const parsed = persistedStateSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Malformed state file ${this.filePath}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }

  async save(state: PersistedState): Promise<void> {
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(state, null, 2), 'utf-8');
    await rename(tmp, this.filePath);
  }
}
