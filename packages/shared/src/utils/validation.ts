import type { ZodError } from 'zod';

/** Flattens zod issues into `path: message` pairs. */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
