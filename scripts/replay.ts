import { rating as openSkillRating, rate as openSkillRate } from 'openskill';
import { Match } from './game_interface';
import { outcomeProbabilities } from './matchmaking';
import { Rating } from './rating';
import { Score, TrueSkill } from './trueskill';

// --- Models ---

export interface RatingModel {
    readonly name: string;
    initial(): Rating;
    /** Expected score for team1: P(win) + P(draw) / 2. */
    predict(team1: readonly Rating[], team2: readonly Rating[]): number;
    rate(team1: readonly Rating[], team2: readonly Rating[], score: Score): [Rating[], Rating[]];
}

function expectedScore(env: TrueSkill, team1: readonly Rating[], team2: readonly Rating[]): number {
    const { win, draw } = outcomeProbabilities(env, team1, team2);
    return win + draw / 2;
}

export function createTrueSkillModel(env: TrueSkill): RatingModel {
    return {
        name: 'TrueSkill',
        initial: () => env.createRating(),
        predict: (team1, team2) => expectedScore(env, team1, team2),
        rate: (team1, team2, score) => env.update(team1, team2, score),
    };
}

// Lower rank is better; equal ranks are a draw
const OPENSKILL_RANKS: Record<Score, number[]> = {
    win: [1, 2],
    loss: [2, 1],
    draw: [1, 1],
};

/**
 * OpenSkill's Plackett-Luce update as a baseline, run with the environment's
 * mu, sigma, beta and tau. Predictions go through the same Gaussian model as
 * TrueSkill so only the update rule differs.
 */
export function createOpenSkillModel(env: TrueSkill): RatingModel {
    return {
        name: 'OpenSkill',
        initial: () => {
            const { mu, sigma } = openSkillRating({ mu: env.mu, sigma: env.sigma });
            return { mu, sigma };
        },
        predict: (team1, team2) => expectedScore(env, team1, team2),
        rate: (team1, team2, score) => {
            const [newTeam1, newTeam2] = openSkillRate([[...team1], [...team2]], {
                rank: OPENSKILL_RANKS[score],
                mu: env.mu,
                sigma: env.sigma,
                beta: env.beta,
                tau: env.tau,
            });
            return [
                newTeam1.map(r => ({ mu: r.mu, sigma: r.sigma })),
                newTeam2.map(r => ({ mu: r.mu, sigma: r.sigma })),
            ];
        },
    };
}

// --- Replay ---

export interface PredictionResult {
    matchIndex: number;
    predictedScore: number;
    actualScore: number; // 1 team1 win, 0.5 draw, 0 team1 loss
    isCorrect: boolean; // always false for draws
}

export interface ReplaySummary {
    model: string;
    matches: number;
    decisive: number;
    correct: number;
    /** Share of decisive matches whose winner was predicted. */
    accuracy: number;
    logLoss: number;
    predictions: PredictionResult[];
    ratings: Map<string, Rating>;
}

const ACTUAL_SCORE: Record<Score, number> = { win: 1, loss: 0, draw: 0.5 };

export function logLoss(predicted: number, actual: number): number {
    const safePrediction = Math.max(0.0001, Math.min(0.9999, predicted));
    return -(actual * Math.log(safePrediction) + (1 - actual) * Math.log(1 - safePrediction));
}

/**
 * Walk-forward replay: each match is predicted from the ratings before it,
 * then the ratings are updated with its result.
 */
export function replayHistory(matches: readonly Match[], model: RatingModel): ReplaySummary {
    const ratings = new Map<string, Rating>();
    const ratingOf = (player: string): Rating => ratings.get(player) ?? model.initial();

    const predictions: PredictionResult[] = [];
    let decisive = 0;
    let correct = 0;
    let totalLogLoss = 0;

    matches.forEach((match, matchIndex) => {
        const team1 = match.team1.map(ratingOf);
        const team2 = match.team2.map(ratingOf);

        const predictedScore = model.predict(team1, team2);
        const actualScore = ACTUAL_SCORE[match.score];

        let isCorrect = false;
        if (match.score !== 'draw') {
            decisive++;
            isCorrect = (predictedScore > 0.5 && actualScore === 1) || (predictedScore < 0.5 && actualScore === 0);
            if (isCorrect) correct++;
        }
        totalLogLoss += logLoss(predictedScore, actualScore);
        predictions.push({ matchIndex, predictedScore, actualScore, isCorrect });

        const [newTeam1, newTeam2] = model.rate(team1, team2, match.score);
        match.team1.forEach((player, i) => ratings.set(player, newTeam1[i]));
        match.team2.forEach((player, i) => ratings.set(player, newTeam2[i]));
    });

    return {
        model: model.name,
        matches: matches.length,
        decisive,
        correct,
        accuracy: decisive > 0 ? correct / decisive : 0,
        logLoss: matches.length > 0 ? totalLogLoss / matches.length : 0,
        predictions,
        ratings,
    };
}

// --- Calibration ---

export interface CalibrationBucket {
    low: number;
    high: number;
    count: number;
    meanPredicted: number;
    actualRate: number;
}

// Groups predictions into equal-width buckets; empty buckets are left out
export function calibrationBuckets(predictions: readonly PredictionResult[], bucketCount: number = 10): CalibrationBucket[] {
    const grouped: PredictionResult[][] = Array.from({ length: bucketCount }, () => []);
    for (const prediction of predictions) {
        const index = Math.min(Math.floor(prediction.predictedScore * bucketCount), bucketCount - 1);
        grouped[index].push(prediction);
    }

    const buckets: CalibrationBucket[] = [];
    grouped.forEach((group, i) => {
        if (group.length === 0) return;
        buckets.push({
            low: i / bucketCount,
            high: (i + 1) / bucketCount,
            count: group.length,
            meanPredicted: group.reduce((sum, p) => sum + p.predictedScore, 0) / group.length,
            actualRate: group.reduce((sum, p) => sum + p.actualScore, 0) / group.length,
        });
    });
    return buckets;
}
