import { IllDefinedMatchError } from './errors';
import { balance, combinations, outcomeProbabilities, quality } from './matchmaking';
import { Rating, createRating } from './rating';
import { TrueSkill } from './trueskill';

// Small deterministic generator so rosters are the same on every run
function makeRoster(seed: number, size: number): Rating[] {
    let state = seed;
    const next = () => {
        state = (state * 16807) % 2147483647;
        return state / 2147483647;
    };
    return Array.from({ length: size }, () => createRating(10 + next() * 30, 1 + next() * 7));
}

describe('quality', () => {
    const env = new TrueSkill({ mu: 3, sigma: 1, beta: 0.5, tau: 0.1, drawProbability: 0.1 });
    const team1 = [createRating(1.0, Math.sqrt(0.1)), createRating(4.0, Math.sqrt(0.5))];
    const team2 = [createRating(2.0, Math.sqrt(0.3)), createRating(2.5, Math.sqrt(0.7))];

    test('should match the closed form', () => {
        expect(quality(env, team1, team2)).toBeCloseTo(0.5910630134064284, 12);
    });

    test('should be symmetric in its teams', () => {
        expect(quality(env, team2, team1)).toBeCloseTo(quality(env, team1, team2), 14);

        const defaults = new TrueSkill();
        const roster = makeRoster(7, 6);
        expect(quality(defaults, roster.slice(0, 2), roster.slice(2))).toBeCloseTo(quality(defaults, roster.slice(2), roster.slice(0, 2)), 14);
    });

    test('should stay within [0, 1]', () => {
        const defaults = new TrueSkill();
        for (let seed = 1; seed <= 20; seed++) {
            const roster = makeRoster(seed, 4);
            const q = quality(defaults, roster.slice(0, 2), roster.slice(2));
            expect(q).toBeGreaterThanOrEqual(0);
            expect(q).toBeLessThanOrEqual(1);
        }
    });

    test('should approach 1 for certain, even teams', () => {
        const defaults = new TrueSkill();

        expect(quality(defaults, [createRating(25, 0)], [createRating(25, 0)])).toBe(1);
    });

    test('should drop as uncertainty grows', () => {
        const defaults = new TrueSkill();
        const sure = quality(defaults, [createRating(25, 1)], [createRating(25, 1)]);
        const unsure = quality(defaults, [createRating(25, 8)], [createRating(25, 8)]);

        expect(unsure).toBeLessThan(sure);
    });

    test('should allow an empty team', () => {
        const defaults = new TrueSkill();

        expect(quality(defaults, [createRating(0, 0)], [])).toBe(1);
    });

    test('should fail deterministically for a match with no variance', () => {
        expect(() => quality(env, [], [])).toThrow(IllDefinedMatchError);
    });
});

describe('outcomeProbabilities', () => {
    test('should give the configured draw rate between certain, equal teams', () => {
        // Given
        const env = new TrueSkill({ drawProbability: 0.1 });
        const side = [createRating(25, 0), createRating(25, 0)];

        // When
        const { win, draw, loss } = outcomeProbabilities(env, side, side);

        // Then
        expect(draw).toBeCloseTo(0.1, 12);
        expect(win).toBeCloseTo(0.45, 12);
        expect(loss).toBeCloseTo(0.45, 12);
    });

    test('should split evenly with no draws configured', () => {
        const env = new TrueSkill();
        const side = [createRating(25, 3)];

        expect(outcomeProbabilities(env, side, side)).toEqual({ win: 0.5, draw: 0, loss: 0.5 });
    });

    test('should favour the stronger team and sum to one', () => {
        const env = new TrueSkill({ drawProbability: 0.1 });

        const { win, draw, loss } = outcomeProbabilities(env, [createRating(32, 2)], [createRating(24, 2)]);

        expect(win).toBeGreaterThan(loss);
        expect(win + draw + loss).toBeCloseTo(1, 12);
    });
});

describe('combinations', () => {
    test('should list subsets in lexicographic order', () => {
        expect([...combinations([1, 2, 3], 2)]).toEqual([[1, 2], [1, 3], [2, 3]]);
    });

    test('should yield one empty subset for size zero and none for oversized requests', () => {
        expect([...combinations([1, 2], 0)]).toEqual([[]]);
        expect([...combinations([1, 2], 3)]).toEqual([]);
    });
});

describe('balance', () => {
    const env = new TrueSkill({ drawProbability: 0.1 });

    test('should return two empty teams for an empty roster', () => {
        expect(balance(env, [])).toEqual([[], []]);
    });

    test('should keep a lone player on team1', () => {
        expect(balance(env, [createRating(25, 3)])).toEqual([[0], []]);
    });

    test('should keep the first partition found when all are equal', () => {
        // Given
        const same = createRating(25, 3);

        // When / Then
        expect(balance(env, [same, same, same, same])).toEqual([[0, 3], [1, 2]]);
    });

    test('should put the odd player out on team1', () => {
        // When
        const [team1, team2] = balance(env, makeRoster(3, 5));

        // Then
        expect(team1).toHaveLength(3);
        expect(team2).toHaveLength(2);
        expect(team1[0]).toBe(0);
    });

    test('should return the same partition on repeated calls', () => {
        const roster = makeRoster(11, 6);

        expect(balance(env, roster)).toEqual(balance(env, roster));
    });

    test('should find the best partition for small rosters', () => {
        for (let size = 2; size <= 6; size++) {
            for (let seed = 1; seed <= 5; seed++) {
                const roster = makeRoster(seed * 31 + size, size);
                const [indices1, indices2] = balance(env, roster);
                const best = quality(env, indices1.map(i => roster[i]), indices2.map(i => roster[i]));

                expect([...indices1, ...indices2].sort((a, b) => a - b)).toEqual(roster.map((_, i) => i));

                // every floor(n / 2)-player team2 that leaves player 0 on team1
                for (let mask = 0; mask < 1 << size; mask++) {
                    if (mask & 1) continue;
                    const side = roster.filter((_, i) => mask & (1 << i));
                    if (side.length !== Math.floor(size / 2)) continue;
                    const rest = roster.filter((_, i) => !(mask & (1 << i)));
                    expect(quality(env, rest, side)).toBeLessThanOrEqual(best + 1e-12);
                }
            }
        }
    });
});
