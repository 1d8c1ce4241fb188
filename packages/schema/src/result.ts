import { z } from 'zod';

// One JSON line per probe result. `status` is `{ ok: <http status> }` or `{ err: <message> }`.
export const probeStatusJsonSchema = z.union([
  z.object({ ok: z.number().int().min(100).max(599) }).strict(),
  z.object({ err: z.string().min(1) }).strict(),
]);
export type ProbeStatusJson = z.infer<typeof probeStatusJsonSchema>;

export const probeResultLineSchema = z
  .object({
    url: z.string().url(),
    round: z.number().int().min(1),
    status: probeStatusJsonSchema,
    attempts: z.number().int().min(1),
    response_time: z.number().int().min(0),
    timestamp: z.string().datetime(),
  })
  .strict();
export type ProbeResultLine = z.infer<typeof probeResultLineSchema>;
