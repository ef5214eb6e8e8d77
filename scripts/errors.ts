import { z } from 'zod';

function describeIssues(issues: z.ZodIssue[]): string {
    return issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

// Invalid environment parameters, rejected before they can reach an update
export class ConfigError extends Error {
    readonly issues: z.ZodIssue[];

    constructor(issues: z.ZodIssue[]) {
        super(`Invalid TrueSkill configuration: ${describeIssues(issues)}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

// A stored rating or match history that does not match its schema
export class RecordError extends Error {
    readonly issues: z.ZodIssue[];

    constructor(what: string, issues: z.ZodIssue[]) {
        super(`Invalid ${what}: ${describeIssues(issues)}`);
        this.name = 'RecordError';
        this.issues = issues;
    }
}

// beta and every variance are zero, so the match has no defined outcome distribution
export class IllDefinedMatchError extends Error {
    constructor(playerCount: number) {
        super(`Ill-defined match: total performance variance is zero for ${playerCount} player(s)`);
        this.name = 'IllDefinedMatchError';
    }
}
