import { z } from 'zod';
import { MAX_PAGES, MIN_PAGES } from '../domain/index.js';

/**
 * Zod schema for one print job as it goes over the wire.
 *
 * - `identity` and `sequence` never leave the agent.
 * - `date` is the local `yyyy-MM-dd HH:mm:ss` rendering of the event time.
 * - `pages` is always within the bounded page range.
 */
export const wireEventSchema = z
  .object({
    date: z.string().min(1),
    user: z.string().min(1),
    machine: z.string().min(1),
    pages: z.number().int().min(MIN_PAGES).max(MAX_PAGES),
    document: z.string().min(1),
    printer: z.string().min(1),
  })
  .strict();

/** Body of `POST /api/print_events`. */
export const wireBatchSchema = z.object({
  events: z.array(wireEventSchema).min(1, 'Batch must contain at least one event'),
});
