/**
 * Represents one decision point of a two-player, zero-sum, perfect-information game.
 *
 * States are immutable values owned by the game model. The engine never builds one
 * itself: it only receives states from the caller and asks them for their successors.
 *
 * IDENTITY:
 * `key()` is the structural identity of the state. Two states with equal keys are
 * interchangeable for every search purpose, and the engine stores all statistics
 * under this key (a `Map` would otherwise compare the objects by reference).
 *
 * REWARD PERSPECTIVE:
 * `reward()` is read from the point of view of the player who is about to move at
 * the terminal state, so a terminal state reached by a winning move yields 0.
 * - 1.0 = win for the player to move
 * - 0.5 = draw
 * - 0.0 = loss for the player to move
 */
export interface SearchState<S extends SearchState<S>> {
    /**
     * All states reachable by one legal move, in a stable order and without two
     * elements sharing a key. Empty iff the state is terminal.
     */
    successors(): readonly S[];

    /**
     * One successor sampled at random.
     * Throws InvalidOperationError when the state is terminal.
     */
    randomSuccessor(): S;

    isTerminal(): boolean;

    /**
     * Outcome in [0, 1] for the player about to move.
     * Only valid on terminal states; throws InvalidOperationError otherwise.
     */
    reward(): number;

    /** Stable structural identity, consistent with equality. */
    key(): string;
}
