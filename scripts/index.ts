/**
 * Two-team TrueSkill.
 *
 * Ratings are Gaussians (mu, sigma). A `TrueSkill` environment updates them
 * after a win, loss or draw, scores how even a match would be, and splits a
 * roster into the most even pair of teams.
 */

export {
    TrueSkill,
    TrueSkillOptionsSchema,
    EnvironmentRecordSchema,
    SCORES,
    DEFAULT_MU,
    DEFAULT_SIGMA,
    DEFAULT_BETA,
    DEFAULT_TAU,
} from './trueskill';

export type {
    Score,
    TrueSkillOptions,
    TrueSkillParameters,
    EnvironmentRecord,
} from './trueskill';

export {
    createRating,
    ratingVariance,
    fromVariance,
    toPerformance,
    addPerformance,
    teamPerformance,
    conservativeRating,
    serializeRating,
    parseRating,
    RatingRecordSchema,
    CONSERVATIVE_FACTOR,
} from './rating';

export type { Rating, Performance, RatingRecord } from './rating';

export { quality, outcomeProbabilities, balance, combinations } from './matchmaking';
export type { OutcomeProbabilities } from './matchmaking';

export { update, updateInPlace, drawMargin, winCorrection, drawCorrection, MIN_VARIANCE } from './update';
export type { Correction } from './update';

export { pdf, cdf, inverseCdf, erfc, erfcx, erfcInv, pdfOverCdf, cdfOverPdf } from './trueskill_math';

export { ConfigError, RecordError, IllDefinedMatchError } from './errors';

export { MatchSchema, MatchHistorySchema } from './game_interface';
export type { Match } from './game_interface';
export { parseMatchHistory, loadMatchHistory } from './match_history';
export {
    createTrueSkillModel,
    createOpenSkillModel,
    replayHistory,
    calibrationBuckets,
    logLoss,
} from './replay';
export type { RatingModel, PredictionResult, ReplaySummary, CalibrationBucket } from './replay';
export { balanceRoster } from './balance_checker';
export type { BalancedSplit } from './balance_checker';
