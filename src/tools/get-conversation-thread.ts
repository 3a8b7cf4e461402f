/**
 * @fileoverview get_conversation_thread MCP tool implementation
 *
 * This module implements the get_conversation_thread MCP tool, which lets
 * an operator read a customer's recent history (customer, AI and operator
 * messages) before deciding whether to take over.
 *
 * @module tools/get-conversation-thread
 * @license MIT
 */

import { z } from 'zod';
import type { ConversationStore } from '../storage/conversation-store.js';
import type { MessageStore } from '../storage/message-store.js';
import type { Message, MessageStatus, SenderType } from '../types/models.js';
import { ConversationNotFoundError } from '../utils/errors.js';
import { phoneField } from '../utils/validation.js';

/**
 * Zod schema for validating get_conversation_thread tool input parameters.
 *
 * @description
 * - `phone` - Required customer phone
 * - `limit` - Latest N messages to return (1-500, default 50)
 * - `includeContext` - Optional boolean, defaults to false
 *
 * @example
 * getConversationThreadSchema.parse({ phone: '15551234567', includeContext: true });
 */
export const getConversationThreadSchema = z.object({
  phone: phoneField,
  limit: z.number().int().min(1).max(500).default(50),
  includeContext: z.boolean().default(false),
});

export type GetConversationThreadParams = z.input<typeof getConversationThreadSchema>;

export interface ThreadMessage {
  id: number;
  direction: 'inbound' | 'outbound';
  sender: SenderType;
  senderId: string | null;
  externalId: string | null;
  text: string | null;
  media: { id: string | null; mimeType: string | null; description: string } | null;
  status: MessageStatus;
  error: string | null;
  timestamp: string;
}

export interface ConversationThread {
  conversationId: number;
  phone: string;
  name: string | null;
  state: 'ACTIVE_AI' | 'ACTIVE_OPERATOR';
  messages: ThreadMessage[];
  context?: {
    summary: string;
    lastActivity: string;
    messageCount: number;
  };
}

function toThreadMessage(message: Message): ThreadMessage {
  return {
    id: message.id,
    direction: message.direction,
    sender: message.senderType,
    senderId: message.senderId,
    externalId: message.externalId,
    text: message.text,
    media: message.media,
    status: message.status,
    error: message.errorCode ? `${message.errorCode}: ${message.errorMessage ?? 'Unknown error'}` : null,
    timestamp: (message.providerTimestamp ?? message.createdAt).toISOString(),
  };
}

/**
 * Retrieve the latest messages of a conversation, oldest first.
 *
 * @description
 * The optional context block counts every stored message, not only the
 * returned page, so the caller knows whether older history exists.
 *
 * @throws {z.ZodError} If input validation fails
 * @throws {ConversationNotFoundError} If no conversation exists for the phone
 *
 * @example
 * const thread = await getConversationThread(context, { phone: '15551234567', limit: 2, includeContext: true });
 * // {
 * //   "conversationId": 4,
 * //   "phone": "15551234567",
 * //   "name": "Ana",
 * //   "state": "ACTIVE_AI",
 * //   "messages": [
 * //     { "direction": "inbound", "sender": "customer", "text": "Hi\nI need a quote", ... },
 * //     { "direction": "outbound", "sender": "ai", "text": "Sure! What do you need?", ... }
 * //   ],
 * //   "context": {
 * //     "summary": "Conversation with Ana (15551234567), answered by the AI",
 * //     "lastActivity": "2025-01-15T10:31:00.000Z",
 * //     "messageCount": 7
 * //   }
 * // }
 */
export async function getConversationThread(
  deps: {
    conversations: Pick<ConversationStore, 'findByPhone'>;
    messages: Pick<MessageStore, 'getByConversation' | 'countByConversation'>;
  },
  params: GetConversationThreadParams
): Promise<ConversationThread> {
  const validated = getConversationThreadSchema.parse(params);

  const conversation = deps.conversations.findByPhone(validated.phone);
  if (!conversation) {
    throw new ConversationNotFoundError(validated.phone);
  }

  const messages = deps.messages.getByConversation(conversation.id, validated.limit);
  const state = conversation.humanInterventionRequired ? 'ACTIVE_OPERATOR' : 'ACTIVE_AI';

  const thread: ConversationThread = {
    conversationId: conversation.id,
    phone: conversation.phone,
    name: conversation.name,
    state,
    messages: messages.map(toThreadMessage),
  };

  if (validated.includeContext) {
    const who = conversation.name ? `${conversation.name} (${conversation.phone})` : conversation.phone;
    thread.context = {
      summary: `Conversation with ${who}, ${state === 'ACTIVE_AI' ? 'answered by the AI' : 'handled by an operator'}`,
      lastActivity: conversation.updatedAt.toISOString(),
      messageCount: deps.messages.countByConversation(conversation.id),
    };
  }

  return thread;
}
