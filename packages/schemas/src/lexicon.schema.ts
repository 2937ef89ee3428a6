import { z } from 'zod';

export const LexiconEntrySchema = z.object({
  conceptId: z.string().regex(/^C\d{7}$/, 'conceptId must look like C0000000'),
  term: z.string().min(1),
});

export const LexiconSchema = z.array(LexiconEntrySchema);

export type LexiconEntry = z.infer<typeof LexiconEntrySchema>;
