import { InvalidOperationError } from '../errors.js';

/**
 * Source of uniformly distributed numbers in [0, 1), shaped like Math.random.
 * Game models take one so that tests can pin down every "random" choice.
 */
export type RandomSource = () => number;

export function pickRandom<T>(items: readonly T[], random: RandomSource = Math.random): T {
    if (items.length === 0) {
        throw new InvalidOperationError('pickRandom called with empty items array');
    }
    // Clamp guards against sources that return exactly 1
    const index = Math.min(Math.floor(random() * items.length), items.length - 1);
    return items[index];
}
