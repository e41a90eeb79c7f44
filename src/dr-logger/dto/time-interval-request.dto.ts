import { z } from 'zod';
import { MAX_INTERVAL_SECONDS } from '../interval-scheduler';

/**
 * Seconds between points, at most 24 days. Fractions are accepted.
 */
export const TimeIntervalRequestSchema = z.object({
  seconds: z.number().finite().positive().max(MAX_INTERVAL_SECONDS),
});

export type TimeIntervalRequest = z.infer<typeof TimeIntervalRequestSchema>;
