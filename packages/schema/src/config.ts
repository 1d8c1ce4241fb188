import { z } from 'zod';

export const headerMatchSchema = z.enum(['exact', 'contains']);
export type HeaderMatch = z.infer<typeof headerMatchSchema>;

export const engineConfigSchema = z
  .object({
    timeoutMs: z.number().int().min(1).max(600_000),
    maxRetries: z.number().int().min(0).max(100),
    workerCount: z.number().int().min(1).max(1_000),
    // Omitted: run a single round.
    periodMs: z.number().int().min(1).optional(),
    retryBackoffMs: z.number().int().min(0).max(60_000).default(0),
    maxRounds: z.number().int().min(1).optional(),
  })
  .strict();
export type EngineConfig = z.infer<typeof engineConfigSchema>;
