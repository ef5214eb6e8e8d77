import * as path from 'path';
import { loadMatchHistory } from './match_history';
import { ReplaySummary, createOpenSkillModel, createTrueSkillModel, replayHistory } from './replay';
import { TrueSkill } from './trueskill';

// --- Main Execution ---

function printSummary(rank: number, summary: ReplaySummary) {
    console.log(`${rank}. ${summary.model}`);
    console.log(`   Accuracy: ${(summary.accuracy * 100).toFixed(2)}% of ${summary.decisive} decisive matches`);
    console.log(`   Log Loss: ${summary.logLoss.toFixed(5)}`);
}

function main() {
    const historyPath = process.argv[2] ?? path.join(__dirname, '../data/sample_matches.json');
    const matches = loadMatchHistory(historyPath);
    const env = new TrueSkill({ drawProbability: 0.1 });

    console.log(`Comparing Models on ${matches.length} matches...`);

    const results = [createTrueSkillModel(env), createOpenSkillModel(env)]
        .map(model => replayHistory(matches, model))
        .sort((a, b) => a.logLoss - b.logLoss);

    console.log(`\nResults:`);
    results.forEach((summary, i) => printSummary(i + 1, summary));

    console.log(`\nConclusion: ${results[0].model} predicts this history best.`);
}

if (require.main === module) {
    try {
        main();
    } catch (error) {
        console.error('Comparison failed:', error instanceof Error ? error.message : error);
        process.exit(1);
    }
}
