import { z } from "zod";

export const conversationMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  createdAt: z.string(),
});

export type ConversationMessage = z.infer<typeof conversationMessageSchema>;

/**
 * On-disk shape of the message cache: thread root ts -> ordered history.
 */
export const messageCacheFileSchema = z.record(z.array(conversationMessageSchema));

export type MessageCacheFile = z.infer<typeof messageCacheFileSchema>;

/**
 * Read/append surface of the conversation cache used by the gate and the agent.
 */
export interface ConversationStore {
  get(conversationId: string): ConversationMessage[];
  append(conversationId: string, messages: ConversationMessage[]): Promise<void>;
}
