import { z } from 'zod';
import { AnalysisError, AnalysisErrorKind } from '../utils/errors';

export const CliOptionsSchema = z
  .object({
    path: z.string().min(1, 'no project path provided'),
    ignore: z
      .string()
      .optional()
      .describe('Comma-separated list of exported identifiers to ignore'),
    json: z.boolean().default(false).describe('Output results in JSON format'),
    fix: z
      .boolean()
      .default(false)
      .describe('Rename unused exported symbols to unexported'),
    dryRun: z
      .boolean()
      .default(false)
      .describe('Preview changes without applying them (requires --fix)'),
    verbose: z.boolean().default(false).describe('Enable verbose logging'),
  })
  .refine(options => !options.dryRun || options.fix, {
    message: '--dry-run requires --fix',
    path: ['dryRun'],
  });

export type CliOptionsInput = z.input<typeof CliOptionsSchema>;
export type CliOptions = z.output<typeof CliOptionsSchema>;

export function parseCliOptions(input: CliOptionsInput): CliOptions {
  const parsed = CliOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new AnalysisError(AnalysisErrorKind.INVALID_INPUT, issue?.message ?? 'invalid options');
  }
  return parsed.data;
}

/**
 * Split a comma-separated ignore list, trimming each entry. An empty list
 * yields no names.
 */
export function parseIgnoreList(csv: string | undefined): string[] {
  if (!csv) {
    return [];
  }
  return csv.split(',').map(name => name.trim());
}
