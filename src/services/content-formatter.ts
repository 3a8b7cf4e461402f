/**
 * @fileoverview Build AI input from a canonical message
 *
 * Two steps: {@link buildAiInput} gathers what the model should see (the
 * text, downloaded media and the message being replied to), and
 * {@link formatContent} renders that into chat-completions content.
 *
 * @module services/content-formatter
 * @license MIT
 */

import type { MessageStore } from '../storage/message-store.js';
import type { CanonicalMessage, MediaCategory } from '../types/models.js';
import { errorMessage } from '../utils/errors.js';
import type { WhatsAppClient } from './whatsapp-client.js';

export type AiContentPart = { type: 'text'; text: string } | { type: 'image_url'; image_url: { url: string } };

/** A plain prompt, or text and image parts. */
export type AiContent = string | AiContentPart[];

export type MediaAttachment =
  | { status: 'downloaded'; category: MediaCategory; mimeType: string; data: Buffer }
  | { status: 'unavailable'; category: MediaCategory; reason: string };

export type ReplyContext = { kind: 'text'; text: string } | { kind: 'media'; attachment: MediaAttachment };

export interface AiInput {
  text: string | null;
  attachment: MediaAttachment | null;
  context: ReplyContext | null;
}

export interface ContentSources {
  messages: Pick<MessageStore, 'getByExternalId'>;
  whatsapp: Pick<WhatsAppClient, 'downloadMedia'>;
}

/**
 * Media category for a stored MIME type.
 */
export function categoryForMime(mimeType: string | null): MediaCategory {
  if (!mimeType) return 'document';
  if (mimeType.startsWith('image/')) return 'image';
  if (mimeType.startsWith('video/')) return 'video';
  if (mimeType.startsWith('audio/')) return 'audio';
  return 'document';
}

async function download(
  sources: ContentSources,
  mediaId: string,
  category: MediaCategory
): Promise<MediaAttachment> {
  try {
    const media = await sources.whatsapp.downloadMedia(mediaId);
    return { status: 'downloaded', category, mimeType: media.mimeType, data: media.data };
  } catch (error) {
    return { status: 'unavailable', category, reason: errorMessage(error) };
  }
}

/**
 * Collect text, media and reply context for one message.
 *
 * @description
 * Download failures do not throw; they become `unavailable` attachments
 * so the model can still answer the text.
 */
export async function buildAiInput(message: CanonicalMessage, sources: ContentSources): Promise<AiInput> {
  const attachment =
    message.kind === 'media' && message.mediaId
      ? await download(sources, message.mediaId, message.category ?? categoryForMime(message.mimeType))
      : null;

  let context: ReplyContext | null = null;
  if (message.replyTo) {
    const quoted = sources.messages.getByExternalId(message.replyTo);
    if (quoted?.media?.id) {
      const category = categoryForMime(quoted.media.mimeType);
      context = { kind: 'media', attachment: await download(sources, quoted.media.id, category) };
    } else if (quoted?.text) {
      context = { kind: 'text', text: quoted.text };
    }
  }

  return { text: message.text, attachment, context };
}

function mediaPart(attachment: MediaAttachment): AiContentPart {
  if (attachment.status === 'unavailable') {
    return { type: 'text', text: `[The ${attachment.category} could not be retrieved: ${attachment.reason}]` };
  }
  if (attachment.category === 'image' || attachment.category === 'sticker') {
    const mimeType = attachment.mimeType.startsWith('image/') ? attachment.mimeType : 'image/jpeg';
    return {
      type: 'image_url',
      image_url: { url: `data:${mimeType};base64,${attachment.data.toString('base64')}` },
    };
  }
  return {
    type: 'text',
    text: `[${attachment.category} attachment (${attachment.mimeType}, ${attachment.data.length} bytes) not shown]`,
  };
}

/**
 * Render {@link AiInput} as model content.
 *
 * @example
 * formatContent({ text: 'Hi', attachment: null, context: null }); // 'Hi'
 */
export function formatContent(input: AiInput): AiContent {
  const text = input.text ?? '';

  if (input.context?.kind === 'text') {
    return [
      `The user's reply message is: ${text}`,
      `The previous message in the conversation was: ${input.context.text}`,
      'Answer the reply in light of the previous message without repeating it.',
    ].join('\n');
  }

  const parts: AiContentPart[] = [];
  if (input.context?.kind === 'media') {
    const category = input.context.attachment.category;
    parts.push({
      type: 'text',
      text: `The user replied to a ${category} with: ${text}\nAnswer using what the ${category} shows.`,
    });
    parts.push(mediaPart(input.context.attachment));
  }
  if (input.attachment) {
    const caption = text ? ` with the caption: ${text}` : ' without a caption';
    parts.push({ type: 'text', text: `User sent a ${input.attachment.category}${caption}.` });
    parts.push(mediaPart(input.attachment));
  }

  return parts.length > 0 ? parts : text;
}

/**
 * Plain-text rendering stored in AI session history; media parts become
 * placeholders.
 */
export function contentToHistoryText(content: AiContent): string {
  if (typeof content === 'string') return content;
  return content.map((part) => (part.type === 'text' ? part.text : '[image]')).join('\n');
}
