/**
 * On-disk shape of the delivery ledger (`processed_events.json`).
 *
 * Field names are part of the file format and shared with older agent
 * versions, hence snake_case.
 */
export interface PersistedState {
  /** Host-qualified identities; legacy files may hold bare integers. */
  readonly processed_ids: ReadonlyArray<string | number>;
  readonly last_update: string;
  readonly highest_id_this_machine: number;
  readonly total_processed: number;
  readonly stats_by_machine: Readonly<Record<string, number>>;
  /**
   * Per host, the highest sequence number compaction removed from
   * `processed_ids`. Everything at or below it counts as delivered.
   */
  readonly compaction_floors: Readonly<Record<string, number>>;
}
