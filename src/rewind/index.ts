/**
 * Rewind Module
 *
 * Tick-ordered history of states and events with rollback and replay.
 */

export * from './types';
export { RewindInvariantError } from './errors';
export {
    createStateRecord,
    createEventRecord,
    recordPrecedes,
    compareRecords,
    undoRecord,
    replayRecord,
    describeRecord,
} from './record';
export { OrderedStore } from './ordered-store';
export { NetworkInbox } from './network-inbox';
export { RewindQueue } from './rewind-queue';
export type { NetworkSink } from './rewind-queue';
export { RewindManager } from './rewind-manager';
export type { UpdateResult } from './rewind-manager';
