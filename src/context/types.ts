import { z } from 'zod';

export const ConversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;

/** Written once per offload; read back only through an explicit load. */
export const ContextArchiveSchema = z.object({
  roleId: z.string().min(1),
  round: z.number().int().nonnegative(),
  createdAt: z.string(),
  messageCount: z.number().int().nonnegative(),
  summary: z.string(),
  messages: z.array(ConversationMessageSchema),
});

export type ContextArchive = z.infer<typeof ContextArchiveSchema>;

export interface OffloadResult {
  archiveLocation: string;
  summary: string;
  reminderText: string;
}

export interface ContextStats {
  tokenCount: number;
  maxTokens: number;
  threshold: number;
  /** 0-100+, rounded to 2 decimals */
  percentageUsed: number;
  shouldOffload: boolean;
}
