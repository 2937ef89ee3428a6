import { z } from 'zod';

const optionalText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .optional();

export const CorpusPaperSchema = z.object({
  paper_title: optionalText,
  paper_authors: z
    .union([z.string(), z.array(z.string())])
    .transform((value) => (Array.isArray(value) ? value.join(', ') : value))
    .optional(),
  paper_journal: optionalText,
  paper_year: optionalText,
  paper_abstract: optionalText,
  paper_full_text: optionalText,
});

export const CorpusSchema = z.record(z.string(), CorpusPaperSchema);

export type CorpusPaper = z.infer<typeof CorpusPaperSchema>;
export type Corpus = z.infer<typeof CorpusSchema>;
