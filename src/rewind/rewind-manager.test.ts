/**
 * RewindManager Tests
 *
 * Drives a tiny counter simulation through the per-tick cycle:
 * merge, rollback when a client hears about its past, forward play.
 */
import { describe, test, expect, vi, afterEach } from 'vitest';
import { RewindQueue } from './rewind-queue';
import { RewindManager } from './rewind-manager';
import { RewindConfig, StateRewinder, EventRewinder, NO_ROLLBACK } from './types';

function createCounterSim(config: Partial<RewindConfig> = {}) {
    const sim: { value: number; stepped: number[] } = { value: 0, stepped: [] };

    const counter: StateRewinder = {
        save: () => new Uint8Array([sim.value]),
        restore: (payload) => { sim.value = payload[0]; },
        undo: () => { },
    };
    const add: EventRewinder = {
        apply: (payload) => { sim.value += payload[0]; },
        undo: (payload) => { sim.value -= payload[0]; },
    };

    const queue = new RewindQueue(config);
    const manager = new RewindManager(queue, (tick) => {
        sim.stepped.push(tick);
    });

    return { sim, counter, add, queue, manager };
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('RewindManager.update', () => {
    test('applies local events as their tick comes up', () => {
        const { sim, counter, add, queue, manager } = createCounterSim();
        queue.saveState(counter, 0, true);
        manager.update(0);

        queue.pushLocalEvent(add, new Uint8Array([1]), false, 1);
        queue.pushLocalEvent(add, new Uint8Array([2]), false, 2);
        manager.update(1);
        expect(sim.value).toBe(1);

        manager.update(2);
        expect(sim.value).toBe(3);
        expect(queue.hasPending()).toBe(false);
    });

    test('a client rolls back and resimulates when a past event arrives', () => {
        const { sim, counter, add, queue, manager } = createCounterSim({ role: 'client' });
        const onRollback = vi.fn();
        manager.onRollback = onRollback;

        queue.saveState(counter, 0, true);
        manager.update(0);
        queue.pushLocalEvent(add, new Uint8Array([1]), false, 1);
        manager.update(1);
        manager.update(2);
        expect(sim.value).toBe(1);

        queue.pushNetworkEvent(add, new Uint8Array([10]), 1);
        const result = manager.update(3);

        expect(result).toEqual({ didRollback: true, rollbackTick: 1 });
        expect(sim.value).toBe(11);
        expect(sim.stepped).toEqual([0, 1, 2]);
        expect(onRollback).toHaveBeenCalledWith(3, 0);

        const stats = manager.getStats();
        expect(stats.rollbackCount).toBe(1);
        expect(stats.maxRollbackDepth).toBe(3);
        expect(stats.ticksResimulated).toBe(3);
    });

    test('a client takes over a confirmed state that arrives for a past tick', () => {
        const { sim, counter, add, queue, manager } = createCounterSim({ role: 'client' });

        queue.saveState(counter, 0, true);
        manager.update(0);
        queue.pushLocalEvent(add, new Uint8Array([1]), false, 2);
        manager.update(1);
        manager.update(2);
        manager.update(3);
        expect(sim.value).toBe(1);

        queue.pushNetworkState(counter, new Uint8Array([50]), 1);
        const result = manager.update(4);

        expect(result).toEqual({ didRollback: true, rollbackTick: 1 });
        expect(sim.value).toBe(51);
        expect(sim.stepped).toEqual([0, 1, 2, 3]);
        expect(queue.hasPending()).toBe(false);
        expect(manager.getStats().maxRollbackDepth).toBe(4);
    });

    test('a server applies late events now instead of rolling back', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => { });
        const { sim, counter, add, queue, manager } = createCounterSim({ role: 'server' });

        queue.saveState(counter, 0, true);
        manager.update(0);
        queue.pushNetworkEvent(add, new Uint8Array([10]), 1);

        const result = manager.update(3);

        expect(result).toEqual({ didRollback: false, rollbackTick: NO_ROLLBACK });
        expect(sim.value).toBe(10);
        expect(sim.stepped).toEqual([]);
        expect(queue.records().map(r => r.tick)).toEqual([0, 3]);
    });

    test('gives up on a rollback without a confirmed state', () => {
        vi.spyOn(console, 'error').mockImplementation(() => { });
        const { sim, counter, add, queue, manager } = createCounterSim({ role: 'client' });

        queue.saveState(counter, 0, false);
        manager.update(0);
        queue.pushNetworkEvent(add, new Uint8Array([5]), 1);

        const result = manager.update(2);

        expect(result).toEqual({ didRollback: false, rollbackTick: 1 });
        expect(sim.stepped).toEqual([]);
        expect(manager.getStats().rollbackCount).toBe(0);
        expect(manager.getStats().noConfirmedState).toBe(1);
    });

    test('prunes history beyond maxHistoryTicks', () => {
        const { counter, queue, manager } = createCounterSim({ maxHistoryTicks: 2 });

        for (let tick = 0; tick <= 5; tick++) {
            queue.saveState(counter, tick, true);
            manager.update(tick);
        }

        expect(queue.records().map(r => r.tick)).toEqual([3, 4, 5]);
    });
});

describe('RewindManager.rollback', () => {
    test('restores the base state before replaying', () => {
        const { sim, counter, add, queue, manager } = createCounterSim();
        sim.value = 7;
        queue.saveState(counter, 0, true);
        queue.pushLocalEvent(add, new Uint8Array([1]), true, 0);
        queue.pushLocalEvent(add, new Uint8Array([2]), true, 1);
        queue.consumeUntil(1);
        expect(sim.value).toBe(10);

        sim.value = 99;
        expect(manager.rollback(1, 2)).toBe(true);

        expect(sim.value).toBe(10);
        expect(sim.stepped).toEqual([0, 1]);
        expect(queue.hasPending()).toBe(false);
    });
});
