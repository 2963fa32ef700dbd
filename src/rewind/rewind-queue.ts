/**
 * RewindQueue - Ordered history of states and events for rollback
 *
 * Every state saved and every event applied is recorded here in tick order.
 * Data received from the network waits in a separate inbox and is merged
 * once per tick (merge). A client that merges something from its past must
 * roll back: undoUntil() walks back to a confirmed state, the states at
 * that tick are restored (restoreStates) and the events of each following
 * tick are replayed (replayUntil) while the simulation steps forward again.
 *
 * Only pushNetworkState/pushNetworkEvent may be called from socket
 * callbacks (see networkSink()); everything else belongs to the
 * simulation loop.
 */

import {
    Tick,
    Cursor,
    StateRewinder,
    EventRewinder,
    RewindRecord,
    MergeResult,
    RewindConfig,
    RewindStats,
    DEFAULT_REWIND_CONFIG,
    NO_CONFIRMED_STATE,
    NO_ROLLBACK,
    createRewindStats,
} from './types';
import { createStateRecord, createEventRecord, undoRecord, replayRecord, describeRecord } from './record';
import { OrderedStore } from './ordered-store';
import { NetworkInbox } from './network-inbox';

/**
 * The part of the queue that network code is allowed to see.
 */
export interface NetworkSink {
    pushNetworkState(rewinder: StateRewinder, payload: Uint8Array, tick: Tick): void;
    pushNetworkEvent(rewinder: EventRewinder, payload: Uint8Array, tick: Tick): void;
}

export class RewindQueue implements NetworkSink {
    private store: OrderedStore;
    private inbox: NetworkInbox = new NetworkInbox();
    private config: RewindConfig;
    private stats: RewindStats = createRewindStats();

    constructor(config: Partial<RewindConfig> = {}) {
        this.config = { ...DEFAULT_REWIND_CONFIG, ...config };
        this.store = new OrderedStore(this.config.checkInvariants);
    }

    get role(): RewindConfig['role'] {
        return this.config.role;
    }

    get maxHistoryTicks(): number {
        return this.config.maxHistoryTicks;
    }

    get cursor(): Cursor {
        return this.store.cursor;
    }

    /** Records merged into history */
    get size(): number {
        return this.store.size;
    }

    /** Records still waiting in the inbox */
    get inboxSize(): number {
        return this.inbox.size;
    }

    // ============================================
    // Local (simulation loop only)
    // ============================================

    pushLocalState(rewinder: StateRewinder, payload: Uint8Array, confirmed: boolean, tick: Tick): void {
        this.store.insert(createStateRecord(tick, rewinder, payload, confirmed));
    }

    pushLocalEvent(rewinder: EventRewinder, payload: Uint8Array, confirmed: boolean, tick: Tick): void {
        this.store.insert(createEventRecord(tick, rewinder, payload, confirmed));
    }

    /**
     * Save a rewinder's current state into history.
     */
    saveState(rewinder: StateRewinder, tick: Tick, confirmed: boolean): void {
        this.pushLocalState(rewinder, rewinder.save(), confirmed, tick);
    }

    // ============================================
    // Network (any callback)
    // ============================================

    /** Network data is authoritative, so always confirmed. */
    pushNetworkState(rewinder: StateRewinder, payload: Uint8Array, tick: Tick): void {
        this.inbox.push(createStateRecord(tick, rewinder, payload, true));
    }

    pushNetworkEvent(rewinder: EventRewinder, payload: Uint8Array, tick: Tick): void {
        this.inbox.push(createEventRecord(tick, rewinder, payload, true));
    }

    /**
     * Narrow view of this queue for transport code.
     */
    networkSink(): NetworkSink {
        return {
            pushNetworkState: (rewinder, payload, tick) => this.pushNetworkState(rewinder, payload, tick),
            pushNetworkEvent: (rewinder, payload, tick) => this.pushNetworkEvent(rewinder, payload, tick),
        };
    }

    // ============================================
    // Merge
    // ============================================

    /**
     * Move every inbox record due at or before `currentTick` into history.
     *
     * A server never rolls back: records from its past are moved to
     * `currentTick` and applied now. A client reports a rollback to the
     * latest overdue tick; restoring a state at or before that tick and
     * replaying forward covers any earlier overdue records too.
     */
    merge(currentTick: Tick): MergeResult {
        const result: MergeResult = { needsRollback: false, rollbackTick: NO_ROLLBACK };
        const { role, debug } = this.config;

        this.inbox.drain(records => {
            if (records.length === 0) return;

            let kept = 0;
            let next = 0;
            try {
                for (; next < records.length; next++) {
                    const record = records[next];

                    // Not due yet
                    if (record.tick > currentTick) {
                        records[kept++] = record;
                        continue;
                    }

                    if (role === 'server' && record.tick < currentTick) {
                        console.warn(`[rewind] At tick ${currentTick} received message from tick ${record.tick}`);
                        record.tick = currentTick;
                        this.stats.staleServerMessages++;
                    }

                    this.store.insert(record);
                    this.stats.merged++;

                    if (debug) {
                        console.log(`[rewind] Inserting ${describeRecord(record)}`);
                    }

                    if (role === 'client' && record.tick < currentTick) {
                        result.needsRollback = true;
                        if (record.tick > result.rollbackTick) {
                            result.rollbackTick = record.tick;
                        }
                    }
                }
            } finally {
                // Records not yet inserted stay for the next merge
                while (next < records.length) {
                    records[kept++] = records[next++];
                }
                records.length = kept;
            }
        });

        return result;
    }

    // ============================================
    // Rewind
    // ============================================

    /**
     * Undo history backward until a confirmed state at or before
     * `targetTick` has been undone. The cursor is left on that state.
     *
     * @returns Tick of the confirmed state, or NO_CONFIRMED_STATE if history
     *          holds none (the caller must not restore anything then)
     */
    undoUntil(targetTick: Tick): Tick {
        // The cursor is on the next record to apply; start from the last applied one
        this.store.stepBack();

        let record = this.store.current();
        while (record) {
            undoRecord(record);

            if (record.kind === 'state' && record.confirmed && record.tick <= targetTick) {
                return record.tick;
            }
            if (!this.store.stepBack()) break;
            record = this.store.current();
        }

        this.stats.noConfirmedState++;
        console.error(`[rewind] No confirmed state for rewind to tick ${targetTick}`);
        this.config.onNoConfirmedState?.(targetTick);
        return NO_CONFIRMED_STATE;
    }

    /**
     * Restore every state at the cursor with the given tick and move past them.
     *
     * @returns Number of states restored
     */
    restoreStates(tick: Tick): number {
        let restored = 0;
        let record = this.store.current();
        while (record && record.tick === tick && record.kind === 'state') {
            replayRecord(record);
            restored++;
            this.store.advance();
            record = this.store.current();
        }
        return restored;
    }

    /**
     * Restore the confirmed states at the cursor with the given tick and move
     * past every state at that tick. Used while resimulating: a confirmed
     * state merged for a past tick replaces what was simulated up to it.
     *
     * @returns Number of states restored
     */
    restoreConfirmedStates(tick: Tick): number {
        let restored = 0;
        let record = this.store.current();
        while (record && record.tick === tick && record.kind === 'state') {
            if (record.confirmed) {
                replayRecord(record);
                restored++;
            }
            this.store.advance();
            record = this.store.current();
        }
        return restored;
    }

    /**
     * Replay the events at the cursor that happened at `tick`.
     * States at that tick are skipped: restoreStates() and
     * restoreConfirmedStates() handle them.
     */
    replayUntil(tick: Tick): void {
        let record = this.store.current();
        while (record && record.tick === tick) {
            if (record.kind === 'event') {
                replayRecord(record);
            }
            this.store.advance();
            record = this.store.current();
        }
    }

    /**
     * Forward play: apply every pending record up to and including `tick`.
     * Events are applied; confirmed states are restored; local speculative
     * states are only checkpoints and are passed over.
     *
     * @returns Number of records consumed
     */
    consumeUntil(tick: Tick): number {
        let consumed = 0;
        let record = this.store.current();
        while (record && record.tick <= tick) {
            if (record.kind === 'event' || record.confirmed) {
                replayRecord(record);
            }
            consumed++;
            this.store.advance();
            record = this.store.current();
        }
        return consumed;
    }

    // ============================================
    // Cursor
    // ============================================

    current(): RewindRecord | undefined {
        return this.store.current();
    }

    /** Mark the current record as consumed. */
    next(): void {
        this.store.advance();
    }

    records(): readonly RewindRecord[] {
        return this.store.records();
    }

    /** True if every record in history has been consumed. */
    isEmpty(): boolean {
        return this.store.cursor.type === 'end';
    }

    /** True if at least one record waits to be consumed. */
    hasPending(): boolean {
        return this.store.cursor.type !== 'end';
    }

    // ============================================
    // Lifecycle
    // ============================================

    /**
     * Evict consumed history older than `tick`.
     * @returns Number of evicted records
     */
    pruneBefore(tick: Tick): number {
        const evicted = this.store.pruneBefore(tick);
        if (evicted > 0 && this.config.debug) {
            console.log(`[rewind] Pruned ${evicted} records before tick ${tick}`);
        }
        return evicted;
    }

    /**
     * Count a completed rollback. Called by the per-tick driver.
     */
    recordRollback(fromTick: Tick, toTick: Tick): void {
        const depth = fromTick - toTick;
        this.stats.rollbackCount++;
        this.stats.ticksResimulated += depth;
        if (depth > this.stats.maxRollbackDepth) {
            this.stats.maxRollbackDepth = depth;
        }
    }

    getStats(): RewindStats {
        return { ...this.stats };
    }

    /**
     * Drop all history and every record still in the inbox.
     * Only call this when no socket callback can push concurrently.
     */
    reset(): void {
        this.inbox.clear();
        this.store.clear();
        this.stats = createRewindStats();
    }
}
