// TrueSkill update for two teams
// Herbrich, Minka & Graepel (2006), with the factor graph collapsed to its closed form for two sides

import { IllDefinedMatchError } from './errors';
import { Performance, Rating, fromVariance, teamPerformance, toPerformance } from './rating';
import { cdf, cdfOverPdf, inverseCdf, pdf, pdfOverCdf } from './trueskill_math';
import type { Score, TrueSkillParameters } from './trueskill';

// Floor for an updated variance; rounding can push 1 - (variance / c^2) * w below zero
export const MIN_VARIANCE = 1e-12;

export interface Correction {
    /** Mean shift, in units of c. */
    v: number;
    /** Variance reduction factor. */
    w: number;
}

/**
 * Performance gap below which a match counts as a draw:
 * inverseCdf((1 + p) / 2) * sqrt(n) * beta.
 */
export function drawMargin(drawProbability: number, playerCount: number, beta: number): number {
    if (drawProbability === 0) return 0;
    return inverseCdf((1 + drawProbability) / 2) * Math.sqrt(playerCount) * beta;
}

// Below this w = v * (v + x) cancels, so its expansion in 1 / x^2 is used
const WIN_ASYMPTOTIC_LIMIT = -100;

// Once exp(-2 * epsilon * |t|) is under double precision the draw is one-sided
const DRAW_ONE_SIDED_LIMIT = 40;

// Moments of the performance gap truncated to "team1 won by more than epsilon"
export function winCorrection(t: number, epsilon: number): Correction {
    const x = t - epsilon;
    const v = pdfOverCdf(x);
    if (x < WIN_ASYMPTOTIC_LIMIT) {
        const q = 1 / (x * x);
        return { v, w: 1 - q * (1 - q * (6 - 50 * q)) };
    }
    return { v, w: v * (v + x) };
}

/**
 * Moments of the performance gap truncated to |gap| <= epsilon.
 *
 * Evaluated at |t| so both bounds sit in the lower tail; v is odd in t and w
 * is even. Outside the margin every term is divided through by pdf(epsilon - |t|)
 * so nothing underflows. When the interval has no mass left (always the case
 * for epsilon = 0) the limits v = sign(t) * (epsilon - |t|), w = 1 are returned.
 */
export function drawCorrection(t: number, epsilon: number): Correction {
    const sign = t < 0 ? -1 : 1;
    const s = Math.abs(t);
    const a = epsilon - s;
    const b = -epsilon - s;

    let v: number;
    let w: number;
    if (a < 0) {
        if (2 * epsilon * s > DRAW_ONE_SIDED_LIMIT) {
            const upper = winCorrection(a, 0);
            return { v: -sign * upper.v, w: upper.w };
        }
        // pdf(b) / pdf(a)
        const ratio = Math.exp(-2 * epsilon * s);
        const scaled = cdfOverPdf(a) - ratio * cdfOverPdf(b);
        if (!(scaled > 0)) {
            return { v: sign * a, w: 1 };
        }
        v = (ratio - 1) / scaled;
        w = v * v + (a - b * ratio) / scaled;
    } else {
        const denom = cdf(a) - cdf(b);
        if (!(denom > 0)) {
            return { v: sign * a, w: 1 };
        }
        v = (pdf(b) - pdf(a)) / denom;
        w = v * v + (a * pdf(a) - b * pdf(b)) / denom;
    }
    return { v: sign * v, w: Math.min(Math.max(w, 0), 1) };
}

function applyCorrection(prior: Performance, direction: 1 | -1, c: number, c2: number, correction: Correction): Rating {
    const mu = prior.mu + direction * (prior.variance / c) * correction.v;
    const variance = prior.variance * (1 - (prior.variance / c2) * correction.w);
    return fromVariance(mu, Math.max(variance, MIN_VARIANCE));
}

/**
 * New ratings for both teams after a match, in the order they were given.
 * The inputs are not modified.
 */
export function update(
    env: TrueSkillParameters,
    team1: readonly Rating[],
    team2: readonly Rating[],
    score: Score
): [Rating[], Rating[]] {
    // Step 1: a loss is the other side's win
    if (score === 'loss') {
        const [newTeam2, newTeam1] = update(env, team2, team1, 'win');
        return [newTeam1, newTeam2];
    }

    // Step 2: dynamics, skill may have drifted since the last match
    const tau2 = env.tau * env.tau;
    const prior1 = team1.map(r => toPerformance(r, tau2));
    const prior2 = team2.map(r => toPerformance(r, tau2));

    // Step 3: team performances
    const perf1 = teamPerformance(prior1);
    const perf2 = teamPerformance(prior2);

    // Step 4: normalisation
    const playerCount = team1.length + team2.length;
    const c2 = playerCount * env.beta * env.beta + perf1.variance + perf2.variance;
    if (!(c2 > 0)) {
        throw new IllDefinedMatchError(playerCount);
    }
    const c = Math.sqrt(c2);
    const t = (perf1.mu - perf2.mu) / c;
    const epsilon = drawMargin(env.drawProbability, playerCount, env.beta) / c;

    // Step 5: truncated Gaussian moments for the observed result
    const correction = score === 'draw' ? drawCorrection(t, epsilon) : winCorrection(t, epsilon);

    // Step 6: share the correction out by each player's variance
    return [
        prior1.map(p => applyCorrection(p, 1, c, c2, correction)),
        prior2.map(p => applyCorrection(p, -1, c, c2, correction)),
    ];
}

// Same as update, but writes the new ratings back into the given arrays
export function updateInPlace(env: TrueSkillParameters, team1: Rating[], team2: Rating[], score: Score): void {
    const [newTeam1, newTeam2] = update(env, team1, team2, score);
    newTeam1.forEach((rating, i) => { team1[i] = rating; });
    newTeam2.forEach((rating, i) => { team2[i] = rating; });
}
