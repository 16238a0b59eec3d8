import { z } from 'zod';

export const formAnswerSchema = z.object({
  type: z.string().nullish(),
  field: z
    .object({
      ref: z.string().nullish(),
    })
    .nullish(),
  choice: z
    .object({
      label: z.string().nullish(),
    })
    .nullish(),
  text: z.string().nullish(),
  number: z.number().nullish(),
  email: z.string().nullish(),
});

export const formPayloadSchema = z.object({
  form_response: z.object({
    answers: z.array(formAnswerSchema),
  }),
});

export type FormAnswer = z.infer<typeof formAnswerSchema>;
