import { z } from 'zod';

// A single recorded match. Scores are from team1's point of view.
export const MatchSchema = z
    .object({
        team1: z.array(z.string().min(1, 'Player name is required')).min(1),
        team2: z.array(z.string().min(1, 'Player name is required')).min(1),
        score: z.enum(['win', 'loss', 'draw']),
        map: z.string().optional(),
        timestamp: z.string().datetime().optional(),
    })
    .superRefine((match, ctx) => {
        const seen = new Set<string>();
        for (const player of [...match.team1, ...match.team2]) {
            if (seen.has(player)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Player "${player}" appears more than once in the match`,
                });
            }
            seen.add(player);
        }
    });

export const MatchHistorySchema = z.array(MatchSchema);

export type Match = z.infer<typeof MatchSchema>;
