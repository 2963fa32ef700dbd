/**
 * Rewind Buffer - Rollback history for lockstep multiplayer
 *
 * Features:
 * - Tick-ordered history of states and events with a consume cursor
 * - Network inbox merged once per tick, with rollback detection
 * - Undo / restore / replay cycle driven by RewindManager
 */

// ============================================
// Rewind (history, merge, rollback)
// ============================================
export * from './rewind';

