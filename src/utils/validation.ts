import { z } from 'zod';
import type { GenerationConfig } from '../types';
import { InvalidConfigError } from './errors';
import { PLACEHOLDER } from './keyspace';

const positiveInt = (field: string) =>
  z
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be > 0`);

export const generationConfigSchema = z
  .object({
    count: positiveInt('count'),
    length: z.number({ invalid_type_error: 'length must be a number' }).int('length must be an integer'),
    pattern: z.string().optional(),
    alphabet: z.string().optional(),
    avoidAmbiguous: z.boolean(),
    unique: z.boolean(),
    groupSize: z.number().int('groupSize must be an integer').min(0, 'groupSize must be >= 0'),
    separator: z.string(),
    uppercase: z.boolean(),
  })
  .superRefine((value, ctx) => {
    // length only matters without a pattern
    if (value.pattern === undefined && value.length <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['length'], message: 'length must be > 0' });
    }
    if (value.pattern !== undefined && !value.pattern.includes(PLACEHOLDER)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern'],
        message: `pattern must contain at least one '${PLACEHOLDER}'`,
      });
    }
  });

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/**
 * @throws InvalidConfigError listing every rule the config breaks
 */
export function validateGenerationConfig(input: GenerationConfig): GenerationConfig {
  const parsed = generationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error));
  }
  return input;
}
