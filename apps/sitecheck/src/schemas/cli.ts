import { headerMatchSchema } from '@sitecheck/schema';
import { z } from 'zod';

// Raw `parseArgs` values: numbers arrive as strings.
export const cliOptionsSchema = z
  .object({
    threads: z.coerce.number().int().min(1).max(1_000).optional(),
    timeout: z.coerce.number().positive().max(600).optional(),
    retries: z.coerce.number().int().min(0).max(100).optional(),
    period: z.coerce.number().positive().max(7 * 86_400).optional(),
    backoff: z.coerce.number().int().min(0).max(60_000).optional(),
    file: z.string().min(1).optional(),
    header: z.array(z.string()).default([]),
    'header-match': headerMatchSchema.default('exact'),
    contains: z.string().min(1).optional(),
    help: z.boolean().default(false),
  })
  .strict();

export type CliOptions = z.infer<typeof cliOptionsSchema>;
