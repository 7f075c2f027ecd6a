import { z } from 'zod';

// Legacy systems send result_code as a number or a numeric string (XML bodies).
const ResultCodeSchema = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, 'Expected an integer result code')
    .transform(Number)
]);

export const LegacyResultSchema = z.object({
  status: z.string().nullish(),
  result_code: ResultCodeSchema.nullish(),
  output: z.string().nullish(),
  timestamp: z.string().nullish()
});

export const LegacyStatusSchema = z.union([
  z.string(),
  z.object({ status: z.string() }).transform(body => body.status)
]);

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
