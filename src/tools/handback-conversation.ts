/**
 * @fileoverview handback_conversation MCP tool implementation
 *
 * @module tools/handback-conversation
 * @license MIT
 */

import { z } from 'zod';
import type { InterventionController } from '../services/intervention-controller.js';
import { ConversationNotFoundError } from '../utils/errors.js';
import { phoneField } from '../utils/validation.js';

export const handbackConversationSchema = z.object({
  phone: phoneField,
});

export type HandbackConversationParams = z.input<typeof handbackConversationSchema>;

/**
 * Return a conversation to the AI assistant. Its next inbound message is
 * answered automatically again.
 *
 * @throws {ConversationNotFoundError} If no conversation exists for the phone
 */
export async function handbackConversation(
  deps: { interventions: Pick<InterventionController, 'handback'> },
  params: HandbackConversationParams
): Promise<{ phone: string; conversationId: number; changed: boolean }> {
  const { phone } = handbackConversationSchema.parse(params);

  const result = await deps.interventions.handback(phone);
  if (result.status === 'not_found') {
    throw new ConversationNotFoundError(phone);
  }
  return { phone, conversationId: result.conversationId, changed: result.changed };
}
