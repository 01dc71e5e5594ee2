import { type ZodIssue } from 'zod';

/** One validation problem: where it is and what is wrong. */
export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

/**
 * Convert zod issues to path/message pairs. An empty path is
 * reported as `(root)`.
 */
export function toValidationIssues(issues: readonly ZodIssue[]): ValidationIssue[] {
    return issues.map(issue => ({
        path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
        message: issue.message,
    }));
}

/** Render issues as an indented bullet list, one per line. */
export function formatIssues(issues: readonly ValidationIssue[]): string {
    return issues
        .map(issue => `  • ${issue.path === '(root)' ? issue.path : `'${issue.path}'`}: ${issue.message}`)
        .join('\n');
}
