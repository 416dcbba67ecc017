import { z } from 'zod';
import { blankToUndefined } from '../common/blank';

export const ChatRequestSchema = z.object({
  // Sent to the assistant as typed; only the emptiness check ignores spaces.
  question: z
    .string()
    .max(2000)
    .refine((q) => q.trim() !== '', 'question is required'),
  code: z.preprocess(
    blankToUndefined,
    z.string().trim().max(200).optional(),
  ),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export type ChatExchange = {
  question: string;
  code: string | null;
  mode: 'contract' | 'aggregate';
  answer: string;
  answeredAt: string;
};
