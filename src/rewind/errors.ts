/**
 * Thrown when the history breaks one of its own invariants (ordering,
 * cursor position, re-entrant inbox drain). Always a programming error.
 */
export class RewindInvariantError extends Error {
    constructor(message: string) {
        super(`[rewind] ${message}`);
        this.name = 'RewindInvariantError';
    }
}
