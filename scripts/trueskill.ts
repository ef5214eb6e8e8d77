import { z } from 'zod';
import { ConfigError } from './errors';
import { Rating, createRating } from './rating';
import { OutcomeProbabilities, balance, outcomeProbabilities, quality } from './matchmaking';
import { update, updateInPlace } from './update';

// --- Defaults ---

export const DEFAULT_MU = 25.0;
export const DEFAULT_SIGMA = DEFAULT_MU / 3;
export const DEFAULT_BETA = DEFAULT_SIGMA / 2;
export const DEFAULT_TAU = DEFAULT_SIGMA / 100;

/** team1's result against team2. */
export type Score = 'win' | 'loss' | 'draw';

export const SCORES: readonly Score[] = ['win', 'loss', 'draw'];

export interface TrueSkillParameters {
    /** Mean of a newcomer's rating. */
    readonly mu: number;
    /** Standard deviation of a newcomer's rating. */
    readonly sigma: number;
    /** Per-player performance noise around skill. */
    readonly beta: number;
    /** Standard deviation added to every rating before each update. */
    readonly tau: number;
    /** Share of matches expected to end in a draw; 0 disables the draw margin. */
    readonly drawProbability: number;
}

// --- Validation ---

const finite = () => z.number().finite();

export const TrueSkillOptionsSchema = z.object({
    mu: finite().default(DEFAULT_MU),
    sigma: finite().nonnegative().default(DEFAULT_SIGMA),
    beta: finite().nonnegative().default(DEFAULT_BETA),
    tau: finite().nonnegative().default(DEFAULT_TAU),
    drawProbability: finite().gte(0).lt(1).default(0),
});

export type TrueSkillOptions = z.input<typeof TrueSkillOptionsSchema>;

// Stored form, field names kept compatible with existing environment records
export const EnvironmentRecordSchema = z.object({
    mu: finite(),
    sigma: finite().nonnegative(),
    beta: finite().nonnegative(),
    tau: finite().nonnegative(),
    draw_probability: finite().gte(0).lt(1).default(0),
});

export type EnvironmentRecord = z.output<typeof EnvironmentRecordSchema>;

// --- Environment ---

/**
 * Immutable TrueSkill environment for two-team matches.
 *
 * One instance can back any number of independent rating computations; every
 * operation is pure and reads only its arguments and these parameters.
 */
export class TrueSkill implements TrueSkillParameters {
    readonly mu: number;
    readonly sigma: number;
    readonly beta: number;
    readonly tau: number;
    readonly drawProbability: number;

    constructor(options: TrueSkillOptions = {}) {
        const result = TrueSkillOptionsSchema.safeParse(options);
        if (!result.success) {
            throw new ConfigError(result.error.issues);
        }
        this.mu = result.data.mu;
        this.sigma = result.data.sigma;
        this.beta = result.data.beta;
        this.tau = result.data.tau;
        this.drawProbability = result.data.drawProbability;
        Object.freeze(this);
    }

    static fromRecord(record: unknown): TrueSkill {
        const result = EnvironmentRecordSchema.safeParse(record);
        if (!result.success) {
            throw new ConfigError(result.error.issues);
        }
        const { mu, sigma, beta, tau, draw_probability } = result.data;
        return new TrueSkill({ mu, sigma, beta, tau, drawProbability: draw_probability });
    }

    toRecord(): EnvironmentRecord {
        return {
            mu: this.mu,
            sigma: this.sigma,
            beta: this.beta,
            tau: this.tau,
            draw_probability: this.drawProbability,
        };
    }

    /** The prior for a player with no history. */
    createRating(): Rating {
        return createRating(this.mu, this.sigma);
    }

    quality(team1: readonly Rating[], team2: readonly Rating[]): number {
        return quality(this, team1, team2);
    }

    outcomeProbabilities(team1: readonly Rating[], team2: readonly Rating[]): OutcomeProbabilities {
        return outcomeProbabilities(this, team1, team2);
    }

    balance(players: readonly Rating[]): [number[], number[]] {
        return balance(this, players);
    }

    update(team1: readonly Rating[], team2: readonly Rating[], score: Score): [Rating[], Rating[]] {
        return update(this, team1, team2, score);
    }

    updateInPlace(team1: Rating[], team2: Rating[], score: Score): void {
        updateInPlace(this, team1, team2, score);
    }
}
