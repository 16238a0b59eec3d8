import { z } from 'zod';

/** Anything other than `html` (case-insensitive) renders the PDF. */
export const processFileSchema = z
  .object({
    outputFormat: z.preprocess(
      (value) => (typeof value === 'string' && value.trim().toLowerCase() === 'html' ? 'html' : 'pdf'),
      z.enum(['pdf', 'html'])
    ),
  })
  .default({});
