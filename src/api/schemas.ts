import { z } from 'zod';

// ── Request schemas ──────────────────────────────────────────────────────────

export const promptBodySchema = z.object({
  prompt: z.string(),
});

export type PromptBody = z.infer<typeof promptBodySchema>;

// ── Response schemas ─────────────────────────────────────────────────────────

export interface ErrorResponse {
  error: string;
  code: string;
}
