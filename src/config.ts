import { z } from 'zod';
import { InvalidOptionsError } from './errors';

export const AssertionLayerOptionsSchema = z.object({
  /** Colour leaves in failure renderings */
  color: z.boolean().default(true),
  /** Log each delivered payload and its matches via console.debug */
  verbose: z.boolean().default(false),
  /** Per-leaf evaluation on start; false starts the layer with every leaf reading satisfied */
  enabled: z.boolean().default(true),
  /** Prefix for log lines */
  name: z.string().min(1).default('assertions'),
});

export type AssertionLayerOptions = z.input<typeof AssertionLayerOptionsSchema>;
export type ResolvedLayerOptions = z.output<typeof AssertionLayerOptionsSchema>;

export function resolveLayerOptions(options: AssertionLayerOptions = {}): ResolvedLayerOptions {
  const parsed = AssertionLayerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidOptionsError('layer', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
