import * as fs from 'fs';
import { RecordError } from './errors';
import { Match, MatchHistorySchema } from './game_interface';

export function parseMatchHistory(data: unknown): Match[] {
    const result = MatchHistorySchema.safeParse(data);
    if (!result.success) {
        throw new RecordError('match history', result.error.issues);
    }
    return result.data;
}

// Reads a JSON array of matches, oldest first
export function loadMatchHistory(filePath: string): Match[] {
    const rawData = fs.readFileSync(filePath, 'utf-8');
    return parseMatchHistory(JSON.parse(rawData));
}
