/**
 * Zod schemas for CLI command options.
 */
import { z } from 'zod';

/**
 * Base schema for the --json flag shared by every command.
 */
export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

const PathOptionSchema = z.string().trim().min(1, 'Path options must not be empty');

/**
 * Export command options. Anything left out falls back to the environment.
 */
export const ExportCommandOptionsSchema = JsonFlagSchema.extend({
  start: z.string().optional(),
  end: z.string().optional(),
  reportDate: z.string().optional(),
  database: PathOptionSchema.optional(),
  queryFile: PathOptionSchema.optional(),
  tierList: PathOptionSchema.optional(),
  outputDir: PathOptionSchema.optional(),
  lender: z.array(z.string().trim().min(1, 'Lender names must not be empty')).optional(),
});

/**
 * Merge command options.
 */
export const MergeCommandOptionsSchema = JsonFlagSchema.extend({
  inputDir: PathOptionSchema.optional(),
  resultDir: PathOptionSchema.optional(),
  outputFile: PathOptionSchema.optional(),
});
