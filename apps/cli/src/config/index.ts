/**
 * CLI Configuration
 */

import { z } from 'zod';

// Blank values in .env count as unset
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

// NODE_ENV and LOG_LEVEL belong to env.ts and the logger
export const envSchema = z.object({
  AUDEX_WORKERS: optional(z.coerce.number().int().positive()),
  AUDEX_OUTPUT_DIR: optional(z.string()),
});

export interface CliConfig {
  defaultWorkers?: number;
  defaultOutputDir: string;
}

/**
 * Parse the environment into CLI settings
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): CliConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const details = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const env = parseResult.data;

  return {
    defaultWorkers: env.AUDEX_WORKERS,
    defaultOutputDir: env.AUDEX_OUTPUT_DIR ?? './audio_out',
  };
}
