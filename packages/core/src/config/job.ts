/**
 * Job Configuration Parsing
 */

import { ValidationError } from '../errors/index.js';
import {
  jobConfigurationSchema,
  type JobConfiguration,
} from '../types/job.js';

/**
 * Validate raw options into a frozen JobConfiguration.
 * The first zod issue is reported as a ValidationError.
 */
export function parseJobConfiguration(input: unknown): JobConfiguration {
  const parsed = jobConfigurationSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'job';
    throw new ValidationError(field, issue?.message ?? 'invalid value');
  }

  return Object.freeze({
    ...parsed.data,
    stream: Object.freeze({ ...parsed.data.stream }),
  });
}
