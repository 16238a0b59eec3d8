import { z } from 'zod';

/** Optional `?email=` override; blank counts as absent. */
export const recipientQuerySchema = z.object({
  email: z
    .string()
    .trim()
    .transform((value) => value || undefined)
    .pipe(z.string().email().optional())
    .optional(),
});
