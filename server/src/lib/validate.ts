import { z } from 'zod';

/**
 * Validates a request body against a Zod schema.
 */
export function validateBody<T extends z.ZodType>(
  schema: T,
  body: unknown,
): { success: true; data: z.output<T> } | { success: false; issues: z.ZodError['issues'] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }
  return { success: true, data: result.data };
}

/** Issues trimmed to what an API client needs to fix its request. */
export function summarizeIssues(issues: z.ZodError['issues']): Array<{ path: string; message: string }> {
  return issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }));
}
