import { expect } from 'chai';
import { StatisticsStore } from '../../../src/statistics-store.js';
import { MCTSSelection } from '../../../src/modular/selection.js';
import { InvariantViolationError } from '../../../src/errors.js';
import { GraphGame, GraphState, keysOf, seedVisits } from '../../helpers/graph-state.js';

describe('MCTSSelection Unit Tests', () => {
    let game: GraphGame;
    let store: StatisticsStore<GraphState>;
    let selection: MCTSSelection<GraphState>;

    const expand = (id: string): void => {
        const state = game.state(id);
        store.setChildren(state, state.successors());
    };

    beforeEach(() => {
        game = new GraphGame({
            root: [ 'a', 'b' ],
            a: [ 'a1' ],
            b: [ 'b1' ],
            a1: 1,
            b1: 0,
            end: 0,
        });
        store = new StatisticsStore<GraphState>();
        selection = new MCTSSelection(store);
    });

    describe('select', () => {
        it('should stop at an unexpanded root', () => {
            const path = selection.select(game.state('root'));
            expect(keysOf(path)).to.deep.equal([ 'root' ]);
        });

        it('should stop at an expanded terminal root', () => {
            expand('end');
            const path = selection.select(game.state('end'));
            expect(keysOf(path)).to.deep.equal([ 'end' ]);
        });

        it('should append the first unexpanded successor', () => {
            expand('root');
            seedVisits(store, game.state('root'), [ 0 ]);

            const path = selection.select(game.state('root'));
            expect(keysOf(path)).to.deep.equal([ 'root', 'a' ]);
        });

        it('should skip successors that are already expanded', () => {
            expand('root');
            expand('a');
            seedVisits(store, game.state('root'), [ 0, 0 ]);
            seedVisits(store, game.state('a'), [ 1 ]);

            const path = selection.select(game.state('root'));
            expect(keysOf(path)).to.deep.equal([ 'root', 'b' ]);
        });

        it('should descend by UCT once every successor is expanded', () => {
            expand('root');
            expand('a');
            expand('b');
            seedVisits(store, game.state('root'), [ 0, 1 ]);
            seedVisits(store, game.state('a'), [ 1 ]);
            seedVisits(store, game.state('b'), [ 0 ]);

            // a: 1 + sqrt(ln 2), b: 0 + sqrt(ln 2)
            const path = selection.select(game.state('root'));
            expect(keysOf(path)).to.deep.equal([ 'root', 'a', 'a1' ]);
        });
    });

    describe('uctSelect', () => {
        beforeEach(() => {
            expand('root');
            expand('a');
            expand('b');
        });

        it('should prefer the higher average reward when visits are equal', () => {
            seedVisits(store, game.state('root'), Array<number>(10).fill(0));
            seedVisits(store, game.state('a'), [ 1, 1, 1, 1, 0 ]);
            seedVisits(store, game.state('b'), [ 1, 1, 0, 0, 0 ]);

            expect(selection.uctSelect(game.state('root')).id).to.equal('a');
        });

        it('should favour the less visited successor through the exploration term', () => {
            seedVisits(store, game.state('root'), Array<number>(10).fill(0));
            // a: 0.75 + sqrt(ln 10 / 8) = 1.2865, b: 0.5 + sqrt(ln 10 / 2) = 1.5730
            seedVisits(store, game.state('a'), [ 1, 1, 1, 1, 1, 1, 0, 0 ]);
            seedVisits(store, game.state('b'), [ 1, 0 ]);

            expect(selection.uctSelect(game.state('root')).id).to.equal('b');
        });

        it('should ignore exploration when its weight is zero', () => {
            const greedy = new MCTSSelection(store, 0);
            seedVisits(store, game.state('root'), Array<number>(10).fill(0));
            seedVisits(store, game.state('a'), [ 1, 1, 1, 1, 1, 1, 0, 0 ]);
            seedVisits(store, game.state('b'), [ 1, 0 ]);

            expect(greedy.uctSelect(game.state('root')).id).to.equal('a');
        });

        it('should break ties in favour of the earliest successor', () => {
            seedVisits(store, game.state('root'), [ 0, 0, 0, 0 ]);
            seedVisits(store, game.state('a'), [ 1, 0 ]);
            seedVisits(store, game.state('b'), [ 0, 1 ]);

            expect(selection.uctSelect(game.state('root')).id).to.equal('a');
        });

        it('should reject an unvisited parent', () => {
            seedVisits(store, game.state('a'), [ 1 ]);
            seedVisits(store, game.state('b'), [ 1 ]);

            expect(() => selection.uctSelect(game.state('root'))).to.throw(InvariantViolationError, 'unvisited state root');
        });

        it('should reject an unvisited successor', () => {
            seedVisits(store, game.state('root'), [ 0 ]);
            seedVisits(store, game.state('a'), [ 1 ]);

            expect(() => selection.uctSelect(game.state('root'))).to.throw(InvariantViolationError, 'unvisited successor b');
        });

        it('should reject an unexpanded successor', () => {
            const fresh = new StatisticsStore<GraphState>();
            const root = game.state('root');
            fresh.setChildren(root, root.successors());
            seedVisits(fresh, root, [ 0 ]);

            expect(() => new MCTSSelection(fresh).uctSelect(root)).to.throw(InvariantViolationError, 'unexpanded successor a');
        });

        it('should reject an unexpanded state', () => {
            expect(() => selection.uctSelect(game.state('a1'))).to.throw(InvariantViolationError, 'unexpanded state a1');
        });

        it('should reject a state without successors', () => {
            expand('end');
            seedVisits(store, game.state('end'), [ 0 ]);

            expect(() => selection.uctSelect(game.state('end'))).to.throw(InvariantViolationError, 'no successors');
        });
    });
});
