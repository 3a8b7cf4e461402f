/**
 * @fileoverview Input validation shared by the HTTP API and the MCP tools
 *
 * @module utils/validation
 * @license MIT
 */

import { z } from 'zod';

/**
 * Customer phone number in international format. A leading `+` is accepted
 * and stripped, since conversations are keyed by the bare digits the
 * provider sends.
 *
 * @example
 * phoneField.parse('+15551234567'); // '15551234567'
 */
export const phoneField = z
  .string({ required_error: 'is required' })
  .trim()
  .regex(/^\+?\d{6,15}$/, 'must be a phone number in international format')
  .transform((phone) => phone.replace(/^\+/, ''));

/** WhatsApp's limit on a text message body. */
export const MAX_TEXT_LENGTH = 4096;

/**
 * Render validation issues as `field problem; field problem`.
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'} ${issue.message}`).join('; ');
}
