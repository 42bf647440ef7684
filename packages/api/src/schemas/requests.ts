import { z } from '@hono/zod-openapi';

export const TextFormSchema = z
  .object({
    text: z.string().trim().min(1, 'text must not be empty').openapi({
      description: 'Event description, or the URL of a page announcing the event',
      example: 'Dinner with Alex tomorrow at 7pm',
    }),
  })
  .openapi('TextForm');

export type TextForm = z.infer<typeof TextFormSchema>;
