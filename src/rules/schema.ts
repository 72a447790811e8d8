import { z } from 'zod';
import type { ZodIssue } from 'zod';

/** Rule names and provider names */
export const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export const nameSchema = z
  .string()
  .regex(NAME_PATTERN, { message: `must match ${NAME_PATTERN.source}` });

const matchSchema = z
  .object({
    include: z.array(z.string()).min(1).describe('Glob patterns, relative to the rules file'),
    exclude: z.array(z.string()).optional(),
  })
  .strict();

const instructionsSchema = z.union([
  z.string().describe('Inline instruction text'),
  z
    .object({
      file: z.string().min(1).describe('Instructions file, relative to the rules file'),
    })
    .strict(),
]);

const additionalContextSchema = z
  .object({
    all_changed_filenames: z.boolean().optional(),
    unchanged_matching_files: z.boolean().optional(),
  })
  .strict();

const reviewSchema = z
  .object({
    strategy: z.enum(['individual', 'matches_together', 'all_changed_files']),
    instructions: instructionsSchema,
    agent: z.record(nameSchema, z.string()).optional().describe('Provider name → persona'),
    additional_context: additionalContextSchema.optional(),
  })
  .strict();

/** Schema for a single rule entry */
export const ruleSchema = z
  .object({
    description: z.string(),
    match: matchSchema,
    review: reviewSchema,
  })
  .strict();

/** A rules file is a mapping of rule name → rule; entries are validated one by one */
export const rulesDocumentSchema = z.record(z.string(), z.unknown());

export type RawRule = z.infer<typeof ruleSchema>;
export type RawInstructions = z.infer<typeof instructionsSchema>;

/**
 * Render a validation issue as `path.within.file: message`.
 */
export function formatIssue(issue: ZodIssue, prefix: readonly string[] = []): string {
  const path = [...prefix, ...issue.path];
  const location = path.length > 0 ? path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}
