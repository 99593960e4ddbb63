import { z } from 'zod';

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const envSchema = z.object({
  LENDER_RANK_DATABASE_PATH: optionalText,
  LENDER_RANK_QUERY_FILE: optionalText,
  LENDER_RANK_TIER_LIST: z.string().min(1).default('competitor-list.csv'),
  LENDER_RANK_OUTPUT_DIR: z.string().min(1).default('output'),
  LENDER_RANK_RESULT_DIR: z.string().min(1).default('result'),
  LENDER_RANK_MERGED_FILE: z.string().min(1).default('all-lenders-exports.csv'),
  LENDER_RANK_START_DATE: optionalText,
  LENDER_RANK_END_DATE: optionalText,
  LENDER_RANK_REPORT_DATE: optionalText,
  LENDER_RANK_SOURCE_TABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier')
    .default('lender_results'),
});

export type PipelineEnv = z.infer<typeof envSchema>;

let validatedEnv: PipelineEnv | undefined;

/**
 * Validate an environment map without caching. Used by tests and by
 * {@link getPipelineEnv}.
 * @throws Error if validation fails
 */
export function parsePipelineEnv(env: NodeJS.ProcessEnv): PipelineEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
export function getPipelineEnv(): PipelineEnv {
  if (!validatedEnv) {
    validatedEnv = parsePipelineEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next access re-reads process.env.
 */
export function resetPipelineEnv(): void {
  validatedEnv = undefined;
}
