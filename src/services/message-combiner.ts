/**
 * @fileoverview Merge a drained buffer batch into one logical message
 *
 * @module services/message-combiner
 * @license MIT
 */

import type { CanonicalMessage } from '../types/models.js';

/**
 * Combine a batch (arrival order) into one canonical message.
 *
 * @description
 * - One message: returned unchanged.
 * - Text only: bodies joined with newlines; phone and name from the first
 *   message; id, timestamp and reply context from the last.
 * - With media: the last media message supplies the media fields, id,
 *   timestamp and reply context; the text is every non-empty body and
 *   caption in arrival order joined with newlines (null when none).
 *
 * @throws {Error} For an empty batch
 *
 * @example
 * combineMessages([hi, quote]).text; // "Hi\nI need a quote"
 */
export function combineMessages(batch: readonly CanonicalMessage[]): CanonicalMessage {
  if (batch.length === 0) {
    throw new Error('Cannot combine an empty batch');
  }
  const first = batch[0];
  if (batch.length === 1) {
    return first;
  }

  const texts = batch.map((message) => message.text).filter((text): text is string => !!text && text.trim() !== '');
  const combinedText = texts.length > 0 ? texts.join('\n') : null;

  const lastMedia = [...batch].reverse().find((message) => message.kind === 'media');
  const source = lastMedia ?? batch[batch.length - 1];

  return {
    kind: lastMedia ? 'media' : 'text',
    category: lastMedia ? lastMedia.category : null,
    direction: 'inbound',
    timestamp: source.timestamp,
    phone: first.phone,
    name: first.name,
    messageId: source.messageId,
    text: combinedText,
    mediaId: lastMedia ? lastMedia.mediaId : null,
    mimeType: lastMedia ? lastMedia.mimeType : null,
    replyTo: source.replyTo,
  };
}
