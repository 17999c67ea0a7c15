// lib/config/runConfig.ts
// Run settings: seed, verbosity, update limit and the variables visible to ${...} spans.

import { z } from 'zod';

export const RunConfigSchema = z.object({
  randomSeed: z.number().int().nonnegative().default(0),
  verbose: z.boolean().default(false),
  /** 0 means no limit. */
  maxUpdates: z.number().int().nonnegative().default(0),
  variables: z.record(z.union([z.number(), z.string()])).default({}),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`);
}

export function parseRunConfig(input: unknown): RunConfig {
  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid run config:\n${formatIssues(result.error).join('\n')}`);
  }
  return result.data;
}

export const defaultRunConfig = (): RunConfig => parseRunConfig({});
