/**
 * @fileoverview Type definitions for data models
 *
 * This module defines TypeScript interfaces for the core data models
 * shared by the storage, routing and HTTP layers: durable conversations
 * and messages, the canonical inbound message produced from WhatsApp
 * webhooks, and the delivery status updates correlated by provider id.
 *
 * @module types/models
 * @license MIT
 */

/**
 * Media categories WhatsApp can deliver or send.
 */
export type MediaCategory = 'image' | 'audio' | 'video' | 'document' | 'sticker';

/** Direction of a stored message relative to the business number. */
export type MessageDirection = 'inbound' | 'outbound';

/** Who authored a stored message. */
export type SenderType = 'customer' | 'ai' | 'operator';

/**
 * Delivery status of a message.
 * New rows start as `pending`; status webhooks move them forward.
 */
export type MessageStatus = 'pending' | 'sent' | 'delivered' | 'read' | 'failed';

export const MESSAGE_STATUSES: readonly MessageStatus[] = ['pending', 'sent', 'delivered', 'read', 'failed'];

/**
 * Conversation with a single customer, keyed by the customer's phone.
 *
 * @description
 * Created on the first inbound message from an unseen phone and never
 * deleted by this service. `humanInterventionRequired` is the durable
 * flag that gates automated replies.
 *
 * @example
 * const conversation: Conversation = {
 *   id: 12,
 *   phone: '15551234567',
 *   name: 'Dana',
 *   lastMessageId: 48,
 *   humanInterventionRequired: false,
 *   createdAt: new Date('2025-01-15T10:00:00Z'),
 *   updatedAt: new Date('2025-01-15T10:30:00Z'),
 * };
 */
export interface Conversation {
  /** Auto-incremented row id. */
  id: number;

  /** WhatsApp id of the customer (digits only, as the provider sends it). */
  phone: string;

  /** Profile name reported by WhatsApp, if any. */
  name: string | null;

  /** Row id of the latest message in the conversation. */
  lastMessageId: number | null;

  /**
   * When true, inbound messages are stored but never answered
   * automatically; a human operator is expected to reply.
   */
  humanInterventionRequired: boolean;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * Provider media reference stored with a message.
 */
export interface MediaInfo {
  /** WhatsApp media id. */
  id: string | null;
  mimeType: string | null;
  description: string;
}

/**
 * Message is an append-only record of one inbound or outbound event.
 *
 * @description
 * `externalId` is the WhatsApp message id. It is unique and is the join
 * key for asynchronous delivery status updates and reply-context lookups.
 * `status` (with its error fields) is the only thing mutated after
 * creation.
 */
export interface Message {
  id: number;
  conversationId: number;
  direction: MessageDirection;
  senderType: SenderType;

  /** Operator id when `senderType` is `operator`. */
  senderId: string | null;

  externalId: string | null;
  hasText: boolean;
  text: string | null;
  media: MediaInfo | null;
  status: MessageStatus;

  /** Provider error code for failed deliveries. */
  errorCode: string | null;
  errorMessage: string | null;

  providerTimestamp: Date | null;
  createdAt: Date;
  metadata: Record<string, unknown> | null;
}

/**
 * Input accepted by {@link MessageStore.insert}.
 */
export interface NewMessage {
  conversationId: number;
  direction: MessageDirection;
  senderType: SenderType;
  senderId?: string | null;
  externalId: string | null;
  text: string | null;
  media?: MediaInfo | null;
  providerTimestamp?: Date | null;
  metadata?: Record<string, unknown> | null;
}

/**
 * Canonical, provider-agnostic representation of one inbound message.
 *
 * @description
 * Produced by the payload normalizer, stored as-is in the message buffer
 * (so it must stay JSON-serializable) and consumed by the router.
 *
 * @example
 * const message: CanonicalMessage = {
 *   kind: 'media',
 *   category: 'image',
 *   direction: 'inbound',
 *   timestamp: 1736935200,
 *   phone: '15551234567',
 *   name: 'Dana',
 *   messageId: 'wamid.HBgLMTU1NTEyMzQ1NjcVAgASGBQzQUVCMEI2',
 *   text: 'This one?',
 *   mediaId: '1234567890',
 *   mimeType: 'image/jpeg',
 *   replyTo: null,
 * };
 */
export interface CanonicalMessage {
  kind: 'text' | 'media';

  /** Media subtype; null for text messages. */
  category: MediaCategory | null;

  direction: 'inbound';

  /** Provider timestamp in seconds since the epoch. */
  timestamp: number;

  phone: string;
  name: string | null;

  /** WhatsApp message id. */
  messageId: string;

  /** Body for text messages, caption for media; null when absent. */
  text: string | null;

  mediaId: string | null;
  mimeType: string | null;

  /** Provider id of the message this one replies to. */
  replyTo: string | null;
}

/**
 * Delivery status update reported by WhatsApp for an outbound message.
 */
export interface StatusUpdate {
  messageId: string;
  status: MessageStatus;
  recipient: string | null;
  timestamp: number | null;
  error: { code: string; message: string } | null;
}
