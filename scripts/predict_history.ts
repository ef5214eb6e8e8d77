import * as path from 'path';
import { loadMatchHistory } from './match_history';
import { conservativeRating } from './rating';
import { calibrationBuckets, createTrueSkillModel, replayHistory } from './replay';
import { TrueSkill } from './trueskill';

// --- Configuration ---
const DRAW_PROBABILITY = 0.1;

function main() {
    // 1. Load Data
    const historyPath = process.argv[2] ?? path.join(__dirname, '../data/sample_matches.json');
    const matches = loadMatchHistory(historyPath);
    const env = new TrueSkill({ drawProbability: DRAW_PROBABILITY });

    console.log(`Loaded ${matches.length} matches from ${historyPath}.`);
    console.log(`Environment: ${JSON.stringify(env.toRecord())}`);

    // 2. Walk-forward replay
    const summary = replayHistory(matches, createTrueSkillModel(env));

    // 3. Report Results
    console.log(`\n--- Performance Summary ---`);
    console.log(`Total Matches: ${summary.matches} (${summary.decisive} decisive)`);
    console.log(`Accuracy: ${(summary.accuracy * 100).toFixed(2)}% (Correctly predicted winner)`);
    console.log(`Log Loss: ${summary.logLoss.toFixed(5)}`);
    console.log(`---------------------------`);

    // 4. Calibration Check
    console.log(`\nCalibration (Expected vs Actual Score):`);
    for (const bucket of calibrationBuckets(summary.predictions)) {
        console.log(`[${bucket.low.toFixed(1)} - ${bucket.high.toFixed(1)}]: ${bucket.count} matches. Pred Avg: ${bucket.meanPredicted.toFixed(2)} | Actual: ${bucket.actualRate.toFixed(2)}`);
    }

    // 5. Final ratings, most conservative estimate first
    console.log(`\nRatings (mu - 3 sigma):`);
    const ranked = [...summary.ratings.entries()].sort((a, b) => conservativeRating(b[1]) - conservativeRating(a[1]));
    for (const [player, rating] of ranked) {
        console.log(`${player.padEnd(20)} ${conservativeRating(rating).toFixed(2).padStart(7)}  (mu ${rating.mu.toFixed(2)}, sigma ${rating.sigma.toFixed(2)})`);
    }
}

if (require.main === module) {
    try {
        main();
    } catch (error) {
        console.error('Replay failed:', error instanceof Error ? error.message : error);
        process.exit(1);
    }
}
