import { IllDefinedMatchError } from './errors';
import { Performance, Rating, teamPerformance, toPerformance } from './rating';
import { cdf } from './trueskill_math';
import { drawMargin } from './update';
import type { TrueSkillParameters } from './trueskill';

export interface OutcomeProbabilities {
    win: number;
    draw: number;
    loss: number;
}

interface MatchSpread {
    team1: Performance;
    team2: Performance;
    playerCount: number;
    c2: number;
}

function matchSpread(env: TrueSkillParameters, team1: readonly Rating[], team2: readonly Rating[]): MatchSpread {
    const playerCount = team1.length + team2.length;
    const perf1 = teamPerformance(team1.map(r => toPerformance(r)));
    const perf2 = teamPerformance(team2.map(r => toPerformance(r)));
    const c2 = playerCount * env.beta * env.beta + perf1.variance + perf2.variance;
    if (!(c2 > 0)) {
        throw new IllDefinedMatchError(playerCount);
    }
    return { team1: perf1, team2: perf2, playerCount, c2 };
}

/**
 * Match quality in [0, 1]: how likely a draw is relative to the likeliest
 * draw possible for these players. 1 means evenly matched and certain.
 *
 * quality = sqrt(n * beta^2 / c^2) * exp(-(mu1 - mu2)^2 / (2 * c^2))
 */
export function quality(env: TrueSkillParameters, team1: readonly Rating[], team2: readonly Rating[]): number {
    const { team1: perf1, team2: perf2, playerCount, c2 } = matchSpread(env, team1, team2);
    const nb2 = playerCount * env.beta * env.beta;
    const dmu = perf1.mu - perf2.mu;
    return Math.sqrt(nb2 / c2) * Math.exp(-(dmu * dmu) / (2 * c2));
}

// Probabilities of each result for team1 under the same performance model the update assumes
export function outcomeProbabilities(
    env: TrueSkillParameters,
    team1: readonly Rating[],
    team2: readonly Rating[]
): OutcomeProbabilities {
    const { team1: perf1, team2: perf2, playerCount, c2 } = matchSpread(env, team1, team2);
    const c = Math.sqrt(c2);
    const margin = drawMargin(env.drawProbability, playerCount, env.beta);
    const delta = perf1.mu - perf2.mu;

    const win = cdf((delta - margin) / c);
    const loss = cdf((-delta - margin) / c);
    return { win, draw: Math.max(0, 1 - win - loss), loss };
}

// k-subsets of items in lexicographic order of position
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
    if (size < 0 || size > items.length) return;
    const indices = Array.from({ length: size }, (_, i) => i);
    while (true) {
        yield indices.map(i => items[i]);

        let i = size - 1;
        while (i >= 0 && indices[i] === i + items.length - size) i--;
        if (i < 0) return;

        indices[i]++;
        for (let j = i + 1; j < size; j++) {
            indices[j] = indices[j - 1] + 1;
        }
    }
}

/**
 * Split a roster into the two teams with the highest match quality.
 *
 * Exhaustive over C(n - 1, floor(n / 2)) partitions: player 0 always stays on
 * team1, since swapping sides does not change quality. Ties keep the first
 * partition found. Only meant for small rosters.
 */
export function balance(env: TrueSkillParameters, players: readonly Rating[]): [number[], number[]] {
    const count = players.length;
    if (count === 0) {
        return [[], []];
    }

    const candidates = Array.from({ length: count - 1 }, (_, i) => i + 1);
    let bestQuality = -Infinity;
    let bestTeams: [number[], number[]] = [[], []];

    for (const picked of combinations(candidates, Math.floor(count / 2))) {
        const onTeam2 = new Set(picked);
        const team1: number[] = [];
        const team2: number[] = [];
        for (let i = 0; i < count; i++) {
            (onTeam2.has(i) ? team2 : team1).push(i);
        }

        const matchQuality = quality(
            env,
            team1.map(i => players[i]),
            team2.map(i => players[i])
        );
        if (matchQuality > bestQuality) {
            bestQuality = matchQuality;
            bestTeams = [team1, team2];
        }
    }

    return bestTeams;
}
