export { Agent, SourceUnavailableError, MAX_BUFFERED, BUFFER_KEEP } from './agent.js';
export type { AgentDeps, AgentPhase, StartupReport, CatchUpResult, TickResult } from './agent.js';
export { DedupStore, DEFAULT_LIMITS } from './dedup-store.js';
export type { DedupStoreOptions, CompactionLimits, LoadResult } from './dedup-store.js';
export { extractEvent } from './extractor.js';
export type { Extraction, ExtractionField } from './extractor.js';
export { detectLanguage, ENGLISH, PORTUGUESE, KEYWORD_SCAN } from './extraction-patterns.js';
export type { Language, PageSource, PatternGroup } from './extraction-patterns.js';
export { chunk } from './batcher.js';
export { wireEventSchema, wireBatchSchema } from './event-schema.js';
export { runLoop, sleep } from './scheduler.js';
export type { LoopOptions, Sleep } from './scheduler.js';
export type { EventSource, StateRepository, Sender, DeliveryReport } from './ports.js';
