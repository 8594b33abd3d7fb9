/**
 * Raised when a caller or a state model uses an operation outside its precondition:
 * choosing a move from a terminal state, asking a non-terminal state for its reward,
 * sampling a successor of a terminal state.
 */
export class InvalidOperationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidOperationError';
    }
}

/**
 * Raised when the engine's own bookkeeping is inconsistent, e.g. UCT selection
 * reached a state whose successors are not all expanded and visited.
 */
export class InvariantViolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvariantViolationError';
    }
}
