/**
 * @fileoverview Operator takeover, handback and operator messages
 *
 * The conversation row's `human_intervention_required` flag is the source
 * of truth for routing and is written synchronously. The AI session store
 * keeps a mirror of the flag (and of operator messages) so the responder
 * has the same picture; those mirror writes run on the task runner with
 * retries and never block the operator.
 *
 * @module services/intervention-controller
 * @license MIT
 */

import type { ConversationStore } from '../storage/conversation-store.js';
import type { SqliteDatabase } from '../storage/database.js';
import type { MessageStore } from '../storage/message-store.js';
import type { SessionStore } from '../storage/session-store.js';
import type { Conversation, MediaInfo } from '../types/models.js';
import { WhatsAppApiError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { isTransientDatabaseError, withRetry } from '../utils/retry.js';
import type { OperatorMediaSource } from './operator-media-source.js';
import type { TaskRunner } from './task-runner.js';
import type { OutboundMediaKind, WhatsAppClient } from './whatsapp-client.js';

/** Who asked for the takeover. */
export type InterventionActor = 'operator' | 'ai';

export type InterventionResult =
  | { status: 'takeover_complete' | 'handback_complete'; changed: boolean; conversationId: number }
  | { status: 'not_found' };

export interface OperatorMessageInput {
  phone: string;
  message: string;
  senderId: string;
  media?: { fileId: string; mimeType: string } | null;
}

export type OperatorMessageResult =
  | { status: 'sent'; messageId: string }
  | { status: 'accepted'; taskId: string }
  | { status: 'not_found' }
  | { status: 'media_unavailable' };

const MIME_TYPES: Readonly<Record<string, [OutboundMediaKind, string]>> = {
  'image/jpeg': ['image', '.jpg'],
  'image/jpg': ['image', '.jpg'],
  'image/png': ['image', '.png'],
  'image/webp': ['image', '.webp'],
  'video/mp4': ['video', '.mp4'],
  'video/3gpp': ['video', '.3gp'],
  'audio/aac': ['audio', '.aac'],
  'audio/mp4': ['audio', '.m4a'],
  'audio/mpeg': ['audio', '.mp3'],
  'audio/amr': ['audio', '.amr'],
  'audio/ogg': ['audio', '.ogg'],
  'application/pdf': ['document', '.pdf'],
  'application/msword': ['document', '.doc'],
  'application/vnd.ms-excel': ['document', '.xls'],
  'application/vnd.ms-powerpoint': ['document', '.ppt'],
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': ['document', '.docx'],
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': ['document', '.xlsx'],
  'application/vnd.openxmlformats-officedocument.presentationml.presentation': ['document', '.pptx'],
};

/**
 * WhatsApp media kind and file extension for a MIME type. Unknown types
 * are sent as documents.
 *
 * @example
 * mediaTypeForMime('audio/ogg');         // { kind: 'audio', extension: '.ogg' }
 * mediaTypeForMime('application/x-foo'); // { kind: 'document', extension: '.bin' }
 */
export function mediaTypeForMime(mimeType: string): { kind: OutboundMediaKind; extension: string } {
  const entry = MIME_TYPES[mimeType.trim().toLowerCase()];
  return entry ? { kind: entry[0], extension: entry[1] } : { kind: 'document', extension: '.bin' };
}

/** Prefix marking operator messages in the AI session history. */
export const OPERATOR_HISTORY_PREFIX = '[OPERATOR MESSAGE]: ';

export interface InterventionControllerDeps {
  db: SqliteDatabase;
  conversations: ConversationStore;
  messages: MessageStore;
  whatsapp: Pick<WhatsAppClient, 'sendText' | 'sendMedia' | 'uploadMedia'>;
  sessions: Pick<SessionStore, 'setOperatorActive' | 'appendMessages'>;
  tasks: TaskRunner;
  /** Null when no operator backend is configured. */
  operatorMedia: Pick<OperatorMediaSource, 'download'> | null;
  logger?: Logger;
}

/**
 * InterventionController implements the takeover/handback protocol.
 *
 * @example
 * await controller.takeover('15551234567');
 * // => { status: 'takeover_complete', changed: true, conversationId: 12 }
 * await controller.takeover('15551234567');
 * // => { status: 'takeover_complete', changed: false, conversationId: 12 }
 */
export class InterventionController {
  private readonly logger: Logger;

  constructor(private readonly deps: InterventionControllerDeps) {
    this.logger = deps.logger ?? createLogger('intervention');
  }

  /**
   * Hand the conversation to a human. Repeated calls succeed without a
   * second mirror write.
   */
  async takeover(phone: string, actor: InterventionActor = 'operator'): Promise<InterventionResult> {
    const result = await this.setFlag(phone, true);
    if (result.status !== 'not_found') {
      this.logger.info(
        `Takeover by ${actor} for ${phone}${result.changed ? '' : ' (already under operator control)'}`
      );
    }
    return result;
  }

  /**
   * Return the conversation to the AI.
   */
  async handback(phone: string): Promise<InterventionResult> {
    const result = await this.setFlag(phone, false);
    if (result.status !== 'not_found') {
      this.logger.info(`Handback for ${phone}${result.changed ? '' : ' (already AI-handled)'}`);
    }
    return result;
  }

  /**
   * Send a message written by an operator.
   *
   * @description
   * Text is sent synchronously. Media is accepted immediately and
   * delivered by a background task (download from the operator backend,
   * upload to WhatsApp, send with the text as caption).
   *
   * @throws {WhatsAppApiError} If WhatsApp rejects a text message
   */
  async sendOperatorMessage(input: OperatorMessageInput): Promise<OperatorMessageResult> {
    const conversation = this.deps.conversations.findByPhone(input.phone);
    if (!conversation) {
      return { status: 'not_found' };
    }

    if (input.media) {
      const source = this.deps.operatorMedia;
      if (!source) {
        return { status: 'media_unavailable' };
      }
      const media = input.media;
      const taskId = this.deps.tasks.enqueue(
        `operator-media:${input.phone}`,
        () => this.deliverMedia(conversation, input, media, source),
        { retries: 2, isRetryable: (error) => !(error instanceof WhatsAppApiError) || error.retriable }
      );
      this.logger.info(`Queued operator media for ${input.phone} (task ${taskId.slice(0, 8)})`);
      return { status: 'accepted', taskId };
    }

    const { messageId } = await this.deps.whatsapp.sendText(input.phone, input.message);
    await this.persistOperatorMessage(conversation, input.senderId, messageId, input.message, null);
    this.mirrorOperatorMessage(input.phone, input.message);
    this.logger.info(`Operator ${input.senderId} sent text to ${input.phone}`);
    return { status: 'sent', messageId };
  }

  private async setFlag(phone: string, required: boolean): Promise<InterventionResult> {
    const conversation = this.deps.conversations.findByPhone(phone);
    if (!conversation) {
      return { status: 'not_found' };
    }

    const changed = await withRetry(
      () => this.deps.conversations.setInterventionRequired(conversation.id, required),
      { retries: 3, baseDelayMs: 100, isRetryable: isTransientDatabaseError }
    );
    if (changed) {
      this.deps.tasks.enqueue(
        `mirror-${required ? 'takeover' : 'handback'}:${phone}`,
        () => this.mirrorFlag(conversation.id, phone),
        { key: `mirror-flag:${phone}` }
      );
    }
    return {
      status: required ? 'takeover_complete' : 'handback_complete',
      changed,
      conversationId: conversation.id,
    };
  }

  /** Mirrors the durable flag as it stands when the task runs. */
  private async mirrorFlag(conversationId: number, phone: string): Promise<void> {
    const current = this.deps.conversations.getById(conversationId);
    if (!current) {
      return;
    }
    await this.deps.sessions.setOperatorActive(phone, current.humanInterventionRequired);
  }

  private async deliverMedia(
    conversation: Conversation,
    input: OperatorMessageInput,
    media: { fileId: string; mimeType: string },
    source: Pick<OperatorMediaSource, 'download'>
  ): Promise<void> {
    const { kind, extension } = mediaTypeForMime(media.mimeType);
    const data = await source.download(media.fileId, media.mimeType);
    const mediaId = await this.deps.whatsapp.uploadMedia(
      data,
      `operator_media_${media.fileId}${extension}`,
      media.mimeType
    );
    const caption = kind === 'audio' ? undefined : input.message || undefined;
    const { messageId } = await this.deps.whatsapp.sendMedia(kind, input.phone, mediaId, caption);

    await this.persistOperatorMessage(conversation, input.senderId, messageId, input.message || null, {
      id: mediaId,
      mimeType: media.mimeType,
      description: kind,
    });
    this.mirrorOperatorMessage(input.phone, input.message || `[${kind}]`);
    this.logger.info(`Operator ${input.senderId} sent ${kind} to ${input.phone}`);
  }

  /**
   * Store the outbound operator message and move the last-message pointer
   * in one transaction. A failure here is logged: the customer already has
   * the message, so the caller still reports success.
   */
  private async persistOperatorMessage(
    conversation: Conversation,
    senderId: string,
    externalId: string,
    text: string | null,
    media: MediaInfo | null
  ): Promise<void> {
    const persist = this.deps.db.transaction(() => {
      const stored = this.deps.messages.insert({
        conversationId: conversation.id,
        direction: 'outbound',
        senderType: 'operator',
        senderId,
        externalId,
        text,
        media,
        providerTimestamp: new Date(),
      });
      if (stored) {
        this.deps.conversations.setLastMessage(conversation.id, stored.id);
      }
    });

    try {
      await withRetry(() => persist.immediate(), { retries: 3, baseDelayMs: 100, isRetryable: isTransientDatabaseError });
    } catch (error) {
      this.logger.error(`Failed to store operator message ${externalId} for ${conversation.phone}:`, error);
    }
  }

  private mirrorOperatorMessage(phone: string, text: string): void {
    this.deps.tasks.enqueue(`mirror-operator-message:${phone}`, () =>
      this.deps.sessions.appendMessages(phone, [{ role: 'assistant', content: `${OPERATOR_HISTORY_PREFIX}${text}` }])
    );
  }
}
