/**
 * NetworkInbox - Staging area for records received from the network
 *
 * Socket callbacks push here at any time; the simulation loop drains it
 * once per tick. No ordering holds among inbox records: they are sorted
 * only when merged into the OrderedStore.
 *
 * The lock is held for a whole drain pass. Records pushed while it is held
 * (from inside the pass) are staged and appended when it is released.
 */

import { RewindRecord } from './types';
import { RewindInvariantError } from './errors';

export class NetworkInbox {
    private records: RewindRecord[] = [];

    /** Pushed while a drain held the lock */
    private staged: RewindRecord[] = [];

    private locked: boolean = false;

    get size(): number {
        return this.records.length + this.staged.length;
    }

    get isLocked(): boolean {
        return this.locked;
    }

    push(record: RewindRecord): void {
        if (this.locked) {
            this.staged.push(record);
        } else {
            this.records.push(record);
        }
    }

    /**
     * Run `fn` with exclusive access to the inbox records.
     * `fn` may remove entries from the array it is given; the lock is
     * released on every exit path, including a throw.
     */
    drain<T>(fn: (records: RewindRecord[]) => T): T {
        if (this.locked) {
            throw new RewindInvariantError('inbox drain is not re-entrant');
        }
        this.locked = true;
        try {
            return fn(this.records);
        } finally {
            this.locked = false;
            if (this.staged.length > 0) {
                this.records.push(...this.staged);
                this.staged = [];
            }
        }
    }

    clear(): void {
        if (this.locked) {
            throw new RewindInvariantError('cannot clear the inbox during a drain');
        }
        this.records = [];
        this.staged = [];
    }
}
