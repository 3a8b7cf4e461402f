/**
 * @fileoverview takeover_conversation MCP tool implementation
 *
 * Lets an operator working from an AI client take a conversation away
 * from the assistant. Same semantics as `POST /takeover`.
 *
 * @module tools/takeover-conversation
 * @license MIT
 */

import { z } from 'zod';
import type { InterventionController } from '../services/intervention-controller.js';
import { ConversationNotFoundError } from '../utils/errors.js';
import { phoneField } from '../utils/validation.js';

/**
 * Zod schema for takeover_conversation input.
 *
 * @example
 * takeoverConversationSchema.parse({ phone: '+15551234567' });
 * // => { phone: '15551234567' }
 */
export const takeoverConversationSchema = z.object({
  phone: phoneField,
});

export type TakeoverConversationParams = z.input<typeof takeoverConversationSchema>;

export interface TakeoverConversationResult {
  phone: string;
  conversationId: number;
  /** False when the conversation was already under operator control. */
  changed: boolean;
}

/**
 * Put a conversation under operator control.
 *
 * @throws {z.ZodError} If input validation fails
 * @throws {ConversationNotFoundError} If no conversation exists for the phone
 *
 * @example
 * const result = await takeoverConversation(context, { phone: '15551234567' });
 * // => { phone: '15551234567', conversationId: 4, changed: true }
 */
export async function takeoverConversation(
  deps: { interventions: Pick<InterventionController, 'takeover'> },
  params: TakeoverConversationParams
): Promise<TakeoverConversationResult> {
  const { phone } = takeoverConversationSchema.parse(params);

  const result = await deps.interventions.takeover(phone, 'operator');
  if (result.status === 'not_found') {
    throw new ConversationNotFoundError(phone);
  }
  return { phone, conversationId: result.conversationId, changed: result.changed };
}
