/**
 * @fileoverview list_conversations MCP tool implementation
 *
 * @module tools/list-conversations
 * @license MIT
 */

import { z } from 'zod';
import type { ConversationStore } from '../storage/conversation-store.js';

export const listConversationsSchema = z.object({
  limit: z.number().int().min(1).max(200).default(20),
  operatorOnly: z.boolean().default(false),
});

export type ListConversationsParams = z.input<typeof listConversationsSchema>;

export interface ConversationSummary {
  conversationId: number;
  phone: string;
  name: string | null;
  state: 'ACTIVE_AI' | 'ACTIVE_OPERATOR';
  lastActivity: string;
}

/**
 * Most recently active conversations first.
 *
 * @example
 * await listConversations(context, { operatorOnly: true });
 * // => { conversations: [{ conversationId: 4, phone: '15551234567', state: 'ACTIVE_OPERATOR', ... }], count: 1 }
 */
export async function listConversations(
  deps: { conversations: Pick<ConversationStore, 'listRecent'> },
  params: ListConversationsParams = {}
): Promise<{ conversations: ConversationSummary[]; count: number }> {
  const validated = listConversationsSchema.parse(params);

  const conversations = deps.conversations
    .listRecent(validated.limit, { operatorOnly: validated.operatorOnly })
    .map((conversation): ConversationSummary => ({
      conversationId: conversation.id,
      phone: conversation.phone,
      name: conversation.name,
      state: conversation.humanInterventionRequired ? 'ACTIVE_OPERATOR' : 'ACTIVE_AI',
      lastActivity: conversation.updatedAt.toISOString(),
    }));

  return { conversations, count: conversations.length };
}
