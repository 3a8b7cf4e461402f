/**
 * @fileoverview WhatsApp webhook payload normalization
 *
 * Turns the nested Cloud API webhook body
 * (`entry[].changes[].value.{contacts,messages,statuses}`) into a flat list
 * of events the rest of the service understands. Each message and status
 * is validated on its own, so one malformed item never hides the others.
 *
 * @module services/payload-normalizer
 * @license MIT
 */

import { z } from 'zod';
import type { CanonicalMessage, MediaCategory, MessageStatus, StatusUpdate } from '../types/models.js';

export type NormalizedEvent =
  | { type: 'inbound'; message: CanonicalMessage }
  | { type: 'status'; update: StatusUpdate }
  | { type: 'unsupported'; reason: string; messageId: string | null };

const mediaObjectSchema = z.object({
  id: z.string(),
  mime_type: z.string().optional(),
  caption: z.string().optional(),
  filename: z.string().optional(),
});

const messageSchema = z.object({
  from: z.string(),
  id: z.string(),
  timestamp: z.coerce.number(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
  image: mediaObjectSchema.optional(),
  audio: mediaObjectSchema.optional(),
  video: mediaObjectSchema.optional(),
  document: mediaObjectSchema.optional(),
  sticker: mediaObjectSchema.optional(),
  button: z.object({ text: z.string(), payload: z.string().optional() }).optional(),
  interactive: z
    .object({
      type: z.string(),
      button_reply: z.object({ id: z.string(), title: z.string() }).optional(),
      list_reply: z.object({ id: z.string(), title: z.string(), description: z.string().optional() }).optional(),
    })
    .optional(),
  context: z.object({ id: z.string().optional(), from: z.string().optional() }).optional(),
});

type WebhookMessage = z.infer<typeof messageSchema>;

const contactSchema = z.object({
  wa_id: z.string(),
  profile: z.object({ name: z.string().optional() }).optional(),
});

const statusSchema = z.object({
  id: z.string(),
  status: z.string(),
  recipient_id: z.string().optional(),
  timestamp: z.coerce.number().optional(),
  errors: z
    .array(
      z.object({
        code: z.coerce.string(),
        title: z.string().optional(),
        message: z.string().optional(),
      })
    )
    .optional(),
});

const valueSchema = z.object({
  contacts: z.array(z.unknown()).optional(),
  messages: z.array(z.unknown()).optional(),
  statuses: z.array(z.unknown()).optional(),
});

const payloadSchema = z.object({
  entry: z.array(
    z.object({
      changes: z.array(z.object({ value: z.unknown() })).default([]),
    })
  ),
});

const MEDIA_CATEGORIES: readonly MediaCategory[] = ['image', 'audio', 'video', 'document', 'sticker'];

const DELIVERY_STATUSES: ReadonlySet<string> = new Set<MessageStatus>(['sent', 'delivered', 'read', 'failed']);

function isMediaCategory(type: string): type is MediaCategory {
  return MEDIA_CATEGORIES.some((category) => category === type);
}

function isDeliveryStatus(status: string): status is MessageStatus {
  return DELIVERY_STATUSES.has(status);
}

/**
 * Normalize one webhook body.
 *
 * @example
 * const events = normalizeWebhookPayload(req.body);
 * for (const event of events) {
 *   if (event.type === 'inbound') buffer(event.message);
 * }
 */
export function normalizeWebhookPayload(body: unknown): NormalizedEvent[] {
  const payload = payloadSchema.safeParse(body);
  if (!payload.success) {
    return [{ type: 'unsupported', reason: 'malformed payload', messageId: null }];
  }

  const events: NormalizedEvent[] = [];
  for (const entry of payload.data.entry) {
    for (const change of entry.changes) {
      const value = valueSchema.safeParse(change.value);
      if (!value.success) {
        events.push({ type: 'unsupported', reason: 'malformed change value', messageId: null });
        continue;
      }
      const names = contactNames(value.data.contacts ?? []);

      for (const raw of value.data.messages ?? []) {
        events.push(normalizeMessage(raw, names));
      }
      for (const raw of value.data.statuses ?? []) {
        events.push(normalizeStatus(raw));
      }
    }
  }
  return events;
}

function contactNames(contacts: unknown[]): Map<string, string> {
  const names = new Map<string, string>();
  for (const raw of contacts) {
    const contact = contactSchema.safeParse(raw);
    if (contact.success && contact.data.profile?.name) {
      names.set(contact.data.wa_id, contact.data.profile.name);
    }
  }
  return names;
}

function normalizeMessage(raw: unknown, names: Map<string, string>): NormalizedEvent {
  const parsed = messageSchema.safeParse(raw);
  if (!parsed.success) {
    return { type: 'unsupported', reason: 'malformed message', messageId: null };
  }
  const message = parsed.data;

  const base = {
    direction: 'inbound' as const,
    timestamp: message.timestamp,
    phone: message.from,
    name: names.get(message.from) ?? null,
    messageId: message.id,
    replyTo: message.context?.id ?? null,
  };

  const text = textBody(message);
  if (text !== null) {
    return {
      type: 'inbound',
      message: { ...base, kind: 'text', category: null, text, mediaId: null, mimeType: null },
    };
  }

  if (isMediaCategory(message.type)) {
    const media = message[message.type];
    if (!media) {
      return { type: 'unsupported', reason: `${message.type} message without media`, messageId: message.id };
    }
    return {
      type: 'inbound',
      message: {
        ...base,
        kind: 'media',
        category: message.type,
        text: media.caption ?? null,
        mediaId: media.id,
        mimeType: media.mime_type ?? null,
      },
    };
  }

  return { type: 'unsupported', reason: `unsupported message type ${message.type}`, messageId: message.id };
}

/**
 * Text carried by text, quick-reply button and interactive replies.
 */
function textBody(message: WebhookMessage): string | null {
  switch (message.type) {
    case 'text':
      return message.text?.body ?? null;
    case 'button':
      return message.button?.text ?? null;
    case 'interactive':
      return message.interactive?.button_reply?.title ?? message.interactive?.list_reply?.title ?? null;
    default:
      return null;
  }
}

function normalizeStatus(raw: unknown): NormalizedEvent {
  const parsed = statusSchema.safeParse(raw);
  if (!parsed.success) {
    return { type: 'unsupported', reason: 'malformed status', messageId: null };
  }
  const status = parsed.data;
  if (!isDeliveryStatus(status.status)) {
    return { type: 'unsupported', reason: `unsupported status ${status.status}`, messageId: status.id };
  }

  const firstError = status.errors?.[0];
  return {
    type: 'status',
    update: {
      messageId: status.id,
      status: status.status,
      recipient: status.recipient_id ?? null,
      timestamp: status.timestamp ?? null,
      error: firstError
        ? { code: firstError.code, message: firstError.message ?? firstError.title ?? 'Unknown error' }
        : null,
    },
  };
}
