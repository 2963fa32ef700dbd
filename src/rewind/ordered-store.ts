/**
 * OrderedStore - Tick-ordered history of states and events
 *
 * Records are kept sorted by (tick, state-before-event). A cursor separates
 * records that were already applied (before it) from the ones still pending
 * (at it and after). The store is only ever touched by the simulation loop,
 * so it has no locking of its own.
 */

import { Tick, Cursor, END_CURSOR, RewindRecord } from './types';
import { recordPrecedes, compareRecords } from './record';
import { RewindInvariantError } from './errors';

export class OrderedStore {
    /** History, sorted by (tick, state-before-event) */
    private items: RewindRecord[] = [];

    /** Next record to consume */
    private _cursor: Cursor = END_CURSOR;

    /** Verify ordering after every insert */
    private checkInvariants: boolean;

    constructor(checkInvariants: boolean = false) {
        this.checkInvariants = checkInvariants;
    }

    get cursor(): Cursor {
        return this._cursor;
    }

    get size(): number {
        return this.items.length;
    }

    /**
     * Insert a record at its sorted position.
     *
     * Scans backward from the tail: new records are almost always close to
     * "now", so the common case stops after a step or two. Records merged
     * from the network that land further in the past cost up to O(n).
     *
     * If the cursor was at the end (nothing pending) it moves to the new
     * record so that it is consumed next. Otherwise it keeps pointing at the
     * same record.
     *
     * @returns Index the record was inserted at
     */
    insert(record: RewindRecord): number {
        let index = this.items.length;
        while (index > 0 && !recordPrecedes(this.items[index - 1], record)) {
            index--;
        }

        this.items.splice(index, 0, record);

        const cursor = this._cursor;
        if (cursor.type === 'end') {
            this._cursor = { type: 'record', index };
        } else if (index <= cursor.index) {
            // Same record, shifted one slot to the right
            this._cursor = { type: 'record', index: cursor.index + 1 };
        }

        if (this.checkInvariants) {
            this.assertOrdered();
        }

        return index;
    }

    /**
     * Record at the cursor, or undefined when nothing is pending.
     */
    current(): RewindRecord | undefined {
        const cursor = this._cursor;
        return cursor.type === 'end' ? undefined : this.items[cursor.index];
    }

    /**
     * Move the cursor past the current record.
     */
    advance(): void {
        const cursor = this._cursor;
        if (cursor.type === 'end') {
            throw new RewindInvariantError('cannot advance past the end of history');
        }
        const next = cursor.index + 1;
        this._cursor = next < this.items.length ? { type: 'record', index: next } : END_CURSOR;
    }

    /**
     * Move the cursor one record back.
     *
     * @returns false if the cursor is already at the first record (or the store is empty)
     */
    stepBack(): boolean {
        const cursor = this._cursor;
        if (cursor.type === 'end') {
            if (this.items.length === 0) return false;
            this._cursor = { type: 'record', index: this.items.length - 1 };
            return true;
        }
        if (cursor.index === 0) return false;
        this._cursor = { type: 'record', index: cursor.index - 1 };
        return true;
    }

    /**
     * Place the cursor on a record. An index equal to size() means 'end'.
     */
    seek(index: number): void {
        if (index < 0 || index > this.items.length) {
            throw new RewindInvariantError(`cursor index ${index} out of range [0, ${this.items.length}]`);
        }
        this._cursor = index === this.items.length ? END_CURSOR : { type: 'record', index };
    }

    at(index: number): RewindRecord | undefined {
        return this.items[index];
    }

    /**
     * Read-only view of the history in order.
     */
    records(): readonly RewindRecord[] {
        return this.items;
    }

    /**
     * Evict consumed records older than `tick`.
     *
     * The newest confirmed state at or before `tick` is always kept, together
     * with everything after it, so a later undoUntil(tick) still finds a base.
     * Nothing is evicted when no such state exists.
     *
     * @returns Number of evicted records
     */
    pruneBefore(tick: Tick): number {
        const cursor = this._cursor;
        const consumed = cursor.type === 'end' ? this.items.length : cursor.index;

        let base = -1;
        for (let i = consumed - 1; i >= 0; i--) {
            const record = this.items[i];
            if (record.kind === 'state' && record.confirmed && record.tick <= tick) {
                base = i;
                break;
            }
        }
        if (base <= 0) return 0;

        let evict = 0;
        while (evict < base && this.items[evict].tick < tick) {
            evict++;
        }
        if (evict === 0) return 0;

        this.items.splice(0, evict);
        if (cursor.type === 'record') {
            this._cursor = { type: 'record', index: cursor.index - evict };
        }
        return evict;
    }

    /**
     * Drop every record and put the cursor at the end.
     */
    clear(): void {
        this.items = [];
        this._cursor = END_CURSOR;
    }

    /**
     * Throw if the ordering or cursor invariants do not hold.
     */
    assertOrdered(): void {
        for (let i = 1; i < this.items.length; i++) {
            if (compareRecords(this.items[i - 1], this.items[i]) > 0) {
                const prev = this.items[i - 1];
                const next = this.items[i];
                throw new RewindInvariantError(
                    `history out of order at ${i}: ${prev.kind}@${prev.tick} before ${next.kind}@${next.tick}`
                );
            }
        }
        const cursor = this._cursor;
        if (cursor.type === 'record' && (cursor.index < 0 || cursor.index >= this.items.length)) {
            throw new RewindInvariantError(`cursor index ${cursor.index} outside history of ${this.items.length}`);
        }
    }
}
