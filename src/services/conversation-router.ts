/**
 * @fileoverview Conversation routing state machine
 *
 * Every combined inbound message is persisted, then either answered by the
 * AI or held for an operator:
 *
 * ```
 *   NEW ──first message──▶ ACTIVE_AI ◀──handback── ACTIVE_OPERATOR
 *                              │                         ▲
 *                              └──takeover (operator/AI)─┘
 * ```
 *
 * The state is derived from the durable `human_intervention_required`
 * flag. The conversation lookup, message insert and last-message pointer
 * update share one immediate transaction.
 *
 * @module services/conversation-router
 * @license MIT
 */

import type { ConversationStore } from '../storage/conversation-store.js';
import type { SqliteDatabase } from '../storage/database.js';
import type { MessageStore } from '../storage/message-store.js';
import type { CanonicalMessage, Conversation } from '../types/models.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { isTransientDatabaseError, sleep, withRetry } from '../utils/retry.js';
import type { AiReply, AiResponder } from './ai-responder.js';
import { buildAiInput, formatContent } from './content-formatter.js';
import type { InterventionController } from './intervention-controller.js';
import type { WhatsAppClient } from './whatsapp-client.js';

export type ConversationState = 'NEW' | 'ACTIVE_AI' | 'ACTIVE_OPERATOR';

export type RouteStatus =
  /** AI reply sent. */
  | 'ai_replied'
  /** AI failed; the apology was sent. */
  | 'fallback_replied'
  /** Nothing was sent (empty AI answer or send failure). */
  | 'no_reply'
  /** An operator took over while the reply was being prepared. */
  | 'suppressed'
  /** Persisted only; an operator handles the conversation. */
  | 'stored_only'
  /** The message id was already stored. */
  | 'duplicate';

export interface RouteOutcome {
  status: RouteStatus;
  state: ConversationState;
  conversationId: number;
  /** Provider id of the outbound reply, when one was sent. */
  replyId?: string;
}

export interface RouterConfig {
  typingDelayMs: number;
  fallbackReply: string;
  aiEnabled: boolean;
}

export interface ConversationRouterDeps {
  db: SqliteDatabase;
  conversations: ConversationStore;
  messages: MessageStore;
  whatsapp: Pick<WhatsAppClient, 'sendText' | 'sendTypingIndicator' | 'downloadMedia'>;
  responder: AiResponder;
  interventions: Pick<InterventionController, 'takeover'>;
  config: RouterConfig;
  logger?: Logger;
  /** Replaced in tests to skip the typing delay. */
  wait?: (ms: number) => Promise<void>;
}

const DB_RETRY = { retries: 3, baseDelayMs: 50, maxDelayMs: 1_000, isRetryable: isTransientDatabaseError };

export class ConversationRouter {
  private readonly logger: Logger;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly deps: ConversationRouterDeps) {
    this.logger = deps.logger ?? createLogger('router');
    this.wait = deps.wait ?? sleep;
  }

  /**
   * Persist an inbound message and decide who answers it.
   */
  async route(message: CanonicalMessage): Promise<RouteOutcome> {
    const persisted = await withRetry(() => this.persistInbound(message), DB_RETRY);
    const { conversation, created, stored } = persisted;

    const state: ConversationState = created
      ? 'NEW'
      : conversation.humanInterventionRequired
        ? 'ACTIVE_OPERATOR'
        : 'ACTIVE_AI';

    if (!stored) {
      this.logger.info(`Message ${message.messageId} already stored; skipping`);
      return { status: 'duplicate', state, conversationId: conversation.id };
    }

    if (conversation.humanInterventionRequired) {
      this.logger.info(`Operator handles ${message.phone}; stored ${message.messageId} only`);
      return { status: 'stored_only', state, conversationId: conversation.id };
    }

    if (!this.deps.config.aiEnabled) {
      return { status: 'stored_only', state, conversationId: conversation.id };
    }

    return this.replyWithAi(message, conversation, state);
  }

  private persistInbound(message: CanonicalMessage): {
    conversation: Conversation;
    created: boolean;
    stored: boolean;
  } {
    const persist = this.deps.db.transaction(() => {
      const { conversation, created } = this.deps.conversations.findOrCreate(message.phone, message.name);
      const stored = this.deps.messages.insert({
        conversationId: conversation.id,
        direction: 'inbound',
        senderType: 'customer',
        externalId: message.messageId,
        text: message.text,
        media: message.mediaId
          ? { id: message.mediaId, mimeType: message.mimeType, description: message.category ?? 'media' }
          : null,
        providerTimestamp: new Date(message.timestamp * 1000),
        metadata: message.replyTo ? { replyTo: message.replyTo } : null,
      });
      if (stored) {
        this.deps.conversations.setLastMessage(conversation.id, stored.id);
      }
      return { conversation, created, stored: stored !== null };
    });
    return persist.immediate();
  }

  private async replyWithAi(
    message: CanonicalMessage,
    conversation: Conversation,
    state: ConversationState
  ): Promise<RouteOutcome> {
    const base = { conversationId: conversation.id };

    let reply: AiReply | null = null;
    try {
      const input = await buildAiInput(message, this.deps);
      reply = await this.deps.responder.respond(message.phone, formatContent(input));
    } catch (error) {
      this.logger.error(`AI responder failed for ${message.phone}:`, error);
    }

    if (reply?.requestedIntervention) {
      try {
        await this.deps.interventions.takeover(message.phone, 'ai');
      } catch (error) {
        this.logger.error(`AI-requested takeover failed for ${message.phone}:`, error);
      }
    }

    const text = reply ? reply.text : this.deps.config.fallbackReply;
    const nextState: ConversationState = reply?.requestedIntervention ? 'ACTIVE_OPERATOR' : 'ACTIVE_AI';
    if (!text) {
      return { ...base, status: 'no_reply', state: nextState };
    }

    await this.deps.whatsapp.sendTypingIndicator(message.messageId);
    await this.wait(this.deps.config.typingDelayMs);

    // The AI's own handoff notice is still sent after its takeover.
    if (!reply?.requestedIntervention && this.operatorTookOver(conversation.id)) {
      this.logger.info(`Operator took over ${message.phone} while replying; reply suppressed`);
      return { ...base, status: 'suppressed', state: 'ACTIVE_OPERATOR' };
    }

    let replyId: string;
    try {
      replyId = (await this.deps.whatsapp.sendText(message.phone, text)).messageId;
    } catch (error) {
      this.logger.error(`Failed to send reply to ${message.phone}: ${errorMessage(error)}`);
      return { ...base, status: 'no_reply', state: nextState };
    }

    await this.persistReply(conversation, replyId, text, reply);
    const status = reply ? 'ai_replied' : 'fallback_replied';
    this.logger.info(`${status} to ${message.phone} (${state} -> ${nextState})`);
    return { ...base, status, state: nextState, replyId };
  }

  private operatorTookOver(conversationId: number): boolean {
    try {
      return this.deps.conversations.getById(conversationId)?.humanInterventionRequired ?? false;
    } catch (error) {
      this.logger.warn(`Could not re-read intervention flag: ${errorMessage(error)}`);
      return false;
    }
  }

  private async persistReply(
    conversation: Conversation,
    replyId: string,
    text: string,
    reply: AiReply | null
  ): Promise<void> {
    const persist = this.deps.db.transaction(() => {
      const stored = this.deps.messages.insert({
        conversationId: conversation.id,
        direction: 'outbound',
        senderType: 'ai',
        externalId: replyId,
        text,
        providerTimestamp: new Date(),
        metadata: reply ? { usage: reply.usage, requestedIntervention: reply.requestedIntervention } : { fallback: true },
      });
      if (stored) {
        this.deps.conversations.setLastMessage(conversation.id, stored.id);
      }
    });

    try {
      await withRetry(() => persist.immediate(), DB_RETRY);
    } catch (error) {
      this.logger.error(`Reply ${replyId} was sent but could not be stored:`, error);
    }
  }
}
