/**
 * Rewind Records
 *
 * Construction, ordering and dispatch for state and event records.
 */

import {
    Tick,
    StateRewinder,
    EventRewinder,
    StateRecord,
    EventRecord,
    RewindRecord,
} from './types';

export function createStateRecord(
    tick: Tick,
    rewinder: StateRewinder,
    payload: Uint8Array,
    confirmed: boolean
): StateRecord {
    return { kind: 'state', tick, confirmed, payload, rewinder };
}

export function createEventRecord(
    tick: Tick,
    rewinder: EventRewinder,
    payload: Uint8Array,
    confirmed: boolean
): EventRecord {
    return { kind: 'event', tick, confirmed, payload, rewinder };
}

/**
 * True if `existing` sorts strictly before `incoming`:
 * earlier tick, or same tick with a state ahead of an event.
 * Equal keys do not precede, so a new record lands in front of its equals.
 */
export function recordPrecedes(existing: RewindRecord, incoming: RewindRecord): boolean {
    if (existing.tick < incoming.tick) return true;
    return existing.tick === incoming.tick &&
        existing.kind === 'state' && incoming.kind === 'event';
}

/**
 * Sort key comparison, used for invariant checks.
 * States sort before events at the same tick.
 */
export function compareRecords(a: RewindRecord, b: RewindRecord): number {
    if (a.tick !== b.tick) return a.tick - b.tick;
    if (a.kind === b.kind) return 0;
    return a.kind === 'state' ? -1 : 1;
}

/** Revert the effect this record caused. */
export function undoRecord(record: RewindRecord): void {
    switch (record.kind) {
        case 'state':
            record.rewinder.undo(record.payload);
            return;
        case 'event':
            record.rewinder.undo(record.payload);
            return;
        default:
            return assertNever(record);
    }
}

/** Reapply this record going forward. */
export function replayRecord(record: RewindRecord): void {
    switch (record.kind) {
        case 'state':
            record.rewinder.restore(record.payload);
            return;
        case 'event':
            record.rewinder.apply(record.payload);
            return;
        default:
            return assertNever(record);
    }
}

export function describeRecord(record: RewindRecord): string {
    const flag = record.confirmed ? 'confirmed' : 'local';
    return `${record.kind}@${record.tick} (${flag}, ${record.payload.byteLength} bytes)`;
}

function assertNever(value: never): never {
    throw new Error(`Unknown record kind: ${JSON.stringify(value)}`);
}
