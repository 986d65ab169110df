import { z } from 'zod';

import { ACCOUNT_FORMATS } from '../process/account-format-utils.js';

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

export const FormatOptionSchema = z.object({
  format: z
    .string()
    .toLowerCase()
    .pipe(z.enum(ACCOUNT_FORMATS, { errorMap: () => ({ message: '--format must be one of: csv, json' }) }))
    .default('csv'),
});

/**
 * Process command input: positional arguments and flags validated together
 */
export const ProcessCommandOptionsSchema = z
  .object({
    input: z.string().trim().min(1, 'An input transaction log path is required'),
    output: z.string().trim().min(1, 'Output path must not be empty').optional(),
  })
  .extend(FormatOptionSchema.shape)
  .extend(VerboseFlagSchema.shape);
