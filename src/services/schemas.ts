import { z } from 'zod';

export const MAX_PERMUTATION_LENGTH = 32;

export const tableEntrySchema = z.number().int().nonnegative().safe();

export const sBoxTableSchema = z.array(z.array(tableEntrySchema)).readonly();

export const permutationSchema = z.array(z.number().int()).readonly();

/**
 * Flattens zod issues into one line for error messages
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
