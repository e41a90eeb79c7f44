import { z } from 'zod';

export const LoggingRequestSchema = z.object({
  logging: z.boolean(),
});

export type LoggingRequest = z.infer<typeof LoggingRequestSchema>;
