/**
 * Stable-id element store with binary-search lookup and lazy tombstone
 * compaction
 *
 * @packageDocumentation
 */

export { TicketMap, COMPACTION_THRESHOLD } from './ticket-map.mjs';
export type { TicketMapOptions } from './ticket-map.mjs';
