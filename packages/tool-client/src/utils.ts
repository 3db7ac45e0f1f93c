import type { z } from 'zod';

/** Freeze a value and everything reachable from it. */
export const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

/** `path.to.field: message` lines for a zod failure. */
export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
