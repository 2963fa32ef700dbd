/**
 * Rewind Types
 *
 * Records, capabilities, cursor and configuration for the rewind buffer.
 * Payloads are opaque byte buffers: only the rewinders understand them.
 */

/** Discrete logical simulation time. */
export type Tick = number;

/** Session role. Fixed for the lifetime of a session. */
export type NetworkRole = 'server' | 'client';

export type RecordKind = 'state' | 'event';

/** Returned by undoUntil() when no confirmed state exists to rewind to. */
export const NO_CONFIRMED_STATE: Tick = -1;

/** rollbackTick of a merge that found nothing overdue. */
export const NO_ROLLBACK: Tick = -1;

// ============================================
// Capabilities (owned by the simulation)
// ============================================

/**
 * A simulation object whose state can be saved, restored and undone.
 */
export interface StateRewinder {
    save(): Uint8Array;
    restore(payload: Uint8Array): void;
    /** Revert a previously applied state step */
    undo(payload: Uint8Array): void;
}

/**
 * Something that applies and reverts events (inputs, spawns, ...).
 */
export interface EventRewinder {
    apply(payload: Uint8Array): void;
    undo(payload: Uint8Array): void;
}

// ============================================
// Records
// ============================================

export interface RecordEnvelope {
    /** Tick this record belongs to. Only a server-side merge rewrites it. */
    tick: Tick;
    /** Authoritative (from the network or trusted) vs local speculation */
    readonly confirmed: boolean;
    /** Owned by the record from the moment it is pushed */
    readonly payload: Uint8Array;
}

export interface StateRecord extends RecordEnvelope {
    readonly kind: 'state';
    readonly rewinder: StateRewinder;
}

export interface EventRecord extends RecordEnvelope {
    readonly kind: 'event';
    readonly rewinder: EventRewinder;
}

export type RewindRecord = StateRecord | EventRecord;

// ============================================
// Cursor
// ============================================

/**
 * Position of the next record to consume.
 * 'end' means everything in the store has been consumed.
 */
export type Cursor =
    | { readonly type: 'record'; readonly index: number }
    | { readonly type: 'end' };

export const END_CURSOR: Cursor = { type: 'end' };

// ============================================
// Merge
// ============================================

export interface MergeResult {
    /** True if a client merged a record from its past */
    needsRollback: boolean;
    /** Latest overdue tick, or NO_ROLLBACK */
    rollbackTick: Tick;
}

// ============================================
// Configuration
// ============================================

export interface RewindConfig {
    /** Server never rolls back; client does (default: 'client') */
    role: NetworkRole;
    /** Log every merged record (default: false) */
    debug: boolean;
    /** Verify ordering after every insert (default: false) */
    checkInvariants: boolean;
    /** Ticks of consumed history kept by RewindManager, 0 = unbounded (default: 0) */
    maxHistoryTicks: number;
    /** Called when undoUntil() exhausts history without a confirmed state */
    onNoConfirmedState: ((targetTick: Tick) => void) | null;
}

export const DEFAULT_REWIND_CONFIG: RewindConfig = {
    role: 'client',
    debug: false,
    checkInvariants: false,
    maxHistoryTicks: 0,
    onNoConfirmedState: null,
};

// ============================================
// Stats
// ============================================

/**
 * Counters for rollback debugging.
 */
export interface RewindStats {
    /** Records moved from the inbox into history */
    merged: number;
    /** Late records a server clamped to the current tick */
    staleServerMessages: number;
    /** Rollbacks that reached a confirmed state */
    rollbackCount: number;
    /** Deepest rollback seen (currentTick - confirmed tick) */
    maxRollbackDepth: number;
    /** Total ticks stepped again during rollbacks */
    ticksResimulated: number;
    /** undoUntil() calls that found no confirmed state */
    noConfirmedState: number;
}

export function createRewindStats(): RewindStats {
    return {
        merged: 0,
        staleServerMessages: 0,
        rollbackCount: 0,
        maxRollbackDepth: 0,
        ticksResimulated: 0,
        noConfirmedState: 0,
    };
}
