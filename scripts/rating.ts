import { z } from 'zod';
import { RecordError } from './errors';

/** A skill belief as a Gaussian: mu is the estimate, sigma its standard deviation. */
export interface Rating {
    mu: number;
    sigma: number;
}

// Internal form used by the math: sums of independent performances add variances, not sigmas
export interface Performance {
    mu: number;
    variance: number;
}

export const CONSERVATIVE_FACTOR = 3;

export const RatingRecordSchema = z.object({
    mu: z.number().finite(),
    sigma: z.number().finite().nonnegative(),
});

export type RatingRecord = z.infer<typeof RatingRecordSchema>;

export function createRating(mu: number, sigma: number): Rating {
    return { mu, sigma };
}

export function ratingVariance(rating: Rating): number {
    return rating.sigma * rating.sigma;
}

export function fromVariance(mu: number, variance: number): Rating {
    return { mu, sigma: Math.sqrt(variance) };
}

// extraVariance is added before combining, e.g. tau^2 for the dynamics step
export function toPerformance(rating: Rating, extraVariance: number = 0): Performance {
    return { mu: rating.mu, variance: ratingVariance(rating) + extraVariance };
}

export function addPerformance(a: Performance, b: Performance): Performance {
    return { mu: a.mu + b.mu, variance: a.variance + b.variance };
}

/**
 * Joint performance of a team, modelled as the sum of its members' independent
 * performances. An empty team contributes nothing.
 */
export function teamPerformance(members: readonly Performance[]): Performance {
    return members.reduce(addPerformance, { mu: 0, variance: 0 });
}

/**
 * Leaderboard estimate mu - k * sigma. A newcomer with the default prior
 * starts near zero and climbs as sigma shrinks.
 */
export function conservativeRating(rating: Rating, k: number = CONSERVATIVE_FACTOR): number {
    return rating.mu - k * rating.sigma;
}

export function serializeRating(rating: Rating): RatingRecord {
    return { mu: rating.mu, sigma: rating.sigma };
}

export function parseRating(record: unknown): Rating {
    const result = RatingRecordSchema.safeParse(record);
    if (!result.success) {
        throw new RecordError('rating record', result.error.issues);
    }
    return createRating(result.data.mu, result.data.sigma);
}
