/**
 * @fileoverview send_operator_message MCP tool implementation
 *
 * Sends a text message to a customer on behalf of an operator. The message
 * is stored with sender type `operator` and mirrored into the AI session
 * history, exactly like `POST /operatormsg`.
 *
 * @module tools/send-operator-message
 * @license MIT
 */

import { z } from 'zod';
import type { InterventionController } from '../services/intervention-controller.js';
import { ConversationNotFoundError } from '../utils/errors.js';
import { MAX_TEXT_LENGTH, phoneField } from '../utils/validation.js';

/**
 * Zod schema for send_operator_message input.
 *
 * @description
 * - `phone` - Customer phone, leading `+` optional
 * - `message` - Text body (1-4096 characters after trimming)
 * - `senderId` - Operator identifier stored with the message, defaults to `mcp`
 */
export const sendOperatorMessageSchema = z.object({
  phone: phoneField,
  message: z.string().trim().min(1).max(MAX_TEXT_LENGTH),
  senderId: z.string().min(1).default('mcp'),
});

export type SendOperatorMessageParams = z.input<typeof sendOperatorMessageSchema>;

export interface SendOperatorMessageResult {
  phone: string;
  messageId: string;
  status: 'sent';
}

/**
 * Send an operator text message.
 *
 * @description
 * Sending does not change the conversation state: an operator who wants
 * the AI to stay quiet takes the conversation over first.
 *
 * @throws {z.ZodError} If input validation fails
 * @throws {ConversationNotFoundError} If the customer never wrote in
 * @throws {WhatsAppApiError} If WhatsApp rejects the message
 *
 * @example
 * await sendOperatorMessage(context, { phone: '15551234567', message: 'On my way!' });
 * // => { phone: '15551234567', messageId: 'wamid.HBgL...', status: 'sent' }
 */
export async function sendOperatorMessage(
  deps: { interventions: Pick<InterventionController, 'sendOperatorMessage'> },
  params: SendOperatorMessageParams
): Promise<SendOperatorMessageResult> {
  const validated = sendOperatorMessageSchema.parse(params);

  const result = await deps.interventions.sendOperatorMessage({
    phone: validated.phone,
    message: validated.message,
    senderId: validated.senderId,
  });

  switch (result.status) {
    case 'sent':
      return { phone: validated.phone, messageId: result.messageId, status: 'sent' };
    case 'not_found':
      throw new ConversationNotFoundError(validated.phone);
    default:
      // Only media messages are queued or need the media backend.
      throw new Error(`Unexpected result for a text message: ${result.status}`);
  }
}
