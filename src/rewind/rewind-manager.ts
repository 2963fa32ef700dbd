/**
 * Rewind Manager
 *
 * Per-tick driver over a RewindQueue:
 * 1. merge() pulls due network records into history
 * 2. if a client merged something from its past, rollback() undoes back to
 *    a confirmed state, restores it and resimulates up to the current tick,
 *    restoring any confirmed state met on the way
 * 3. consumeUntil() applies the records due this tick
 * 4. history older than maxHistoryTicks is pruned
 *
 * The simulation itself stays outside: `step(tick)` advances it one tick.
 */

import { Tick, NO_CONFIRMED_STATE, NO_ROLLBACK, RewindStats } from './types';
import { RewindQueue } from './rewind-queue';

export interface UpdateResult {
    didRollback: boolean;
    /** Tick the rollback was requested for, or NO_ROLLBACK */
    rollbackTick: Tick;
}

export class RewindManager {
    private queue: RewindQueue;

    /** Advance the external simulation by one tick */
    private step: (tick: Tick) => void;

    /** Callback when a rollback reached a confirmed state */
    public onRollback: ((fromTick: Tick, toTick: Tick) => void) | null = null;

    constructor(queue: RewindQueue, step: (tick: Tick) => void) {
        this.queue = queue;
        this.step = step;
    }

    /**
     * Run once per simulation tick, before stepping `currentTick`.
     */
    update(currentTick: Tick): UpdateResult {
        const { needsRollback, rollbackTick } = this.queue.merge(currentTick);

        let didRollback = false;
        if (needsRollback) {
            didRollback = this.rollback(rollbackTick, currentTick);
        }

        this.queue.consumeUntil(currentTick);

        const maxHistory = this.queue.maxHistoryTicks;
        if (maxHistory > 0) {
            this.queue.pruneBefore(currentTick - maxHistory);
        }

        return { didRollback, rollbackTick: needsRollback ? rollbackTick : NO_ROLLBACK };
    }

    /**
     * Undo back to a confirmed state at or before `targetTick`, restore it,
     * then replay events and step every tick up to (not including) `currentTick`.
     * Confirmed states of later ticks are restored as their tick comes up.
     *
     * @returns false if history holds no confirmed state to rewind to
     */
    rollback(targetTick: Tick, currentTick: Tick): boolean {
        const baseTick = this.queue.undoUntil(targetTick);
        if (baseTick === NO_CONFIRMED_STATE) {
            return false;
        }

        this.queue.restoreStates(baseTick);

        for (let tick = baseTick; tick < currentTick; tick++) {
            if (tick > baseTick) {
                this.queue.restoreConfirmedStates(tick);
            }
            this.queue.replayUntil(tick);
            this.step(tick);
        }

        this.queue.recordRollback(currentTick, baseTick);
        if (this.onRollback) {
            this.onRollback(currentTick, baseTick);
        }
        return true;
    }

    getStats(): RewindStats {
        return this.queue.getStats();
    }
}
