import { loadMatchHistory } from './match_history';
import { Rating } from './rating';
import { createTrueSkillModel, replayHistory } from './replay';
import { TrueSkill } from './trueskill';

export interface BalancedSplit {
    team1: string[];
    team2: string[];
    quality: number;
}

// Players missing from the ratings start from the environment's prior
export function balanceRoster(env: TrueSkill, roster: readonly string[], ratings: ReadonlyMap<string, Rating>): BalancedSplit {
    const players = roster.map(name => ratings.get(name) ?? env.createRating());
    const [indices1, indices2] = env.balance(players);
    return {
        team1: indices1.map(i => roster[i]),
        team2: indices2.map(i => roster[i]),
        quality: roster.length > 0 ? env.quality(indices1.map(i => players[i]), indices2.map(i => players[i])) : 0,
    };
}

function main() {
    const [historyPath, ...roster] = process.argv.slice(2);
    if (!historyPath || roster.length < 2) {
        console.error('Usage: balance_checker <history.json> <player> <player> [player...]');
        process.exit(1);
    }

    const env = new TrueSkill({ drawProbability: 0.1 });
    const { ratings } = replayHistory(loadMatchHistory(historyPath), createTrueSkillModel(env));

    const unknown = roster.filter(name => !ratings.has(name));
    if (unknown.length > 0) {
        console.log(`No history for ${unknown.join(', ')}; using the default rating.`);
    }

    const split = balanceRoster(env, roster, ratings);
    console.log(`Team 1: ${split.team1.join(', ')}`);
    console.log(`Team 2: ${split.team2.join(', ')}`);
    console.log(`Match quality: ${(split.quality * 100).toFixed(1)}%`);
}

if (require.main === module) {
    try {
        main();
    } catch (error) {
        console.error('Balance check failed:', error instanceof Error ? error.message : error);
        process.exit(1);
    }
}
