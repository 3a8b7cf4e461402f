/**
 * @fileoverview Composition root
 *
 * Builds every store and service from the validated configuration and
 * wires them together. Both entry points (HTTP server and operator MCP
 * server) create one context and close it on shutdown.
 *
 * @module app-context
 * @license MIT
 */

import { existsSync, readFileSync } from 'node:fs';
import type { EnvConfig } from './config/env.js';
import { BufferStore } from './storage/buffer-store.js';
import { ConversationStore } from './storage/conversation-store.js';
import { openDatabase, type SqliteDatabase } from './storage/database.js';
import { DedupStore } from './storage/dedup-store.js';
import { MessageStore } from './storage/message-store.js';
import { SessionStore } from './storage/session-store.js';
import { ChatCompletionsResponder, type AiResponder } from './services/ai-responder.js';
import { ConversationRouter } from './services/conversation-router.js';
import { DebounceScheduler } from './services/debounce-scheduler.js';
import { InterventionController } from './services/intervention-controller.js';
import { combineMessages } from './services/message-combiner.js';
import { OperatorMediaSource } from './services/operator-media-source.js';
import { TaskRunner } from './services/task-runner.js';
import { WhatsAppClient, type FetchLike } from './services/whatsapp-client.js';
import type { WebhookServerDeps } from './webhook-server.js';
import { createLogger, setLogLevel, type Logger } from './utils/logger.js';

const FALLBACK_SYSTEM_PROMPT =
  'You are a helpful customer support assistant on WhatsApp. Reply briefly and politely.';

export interface AppContextOverrides {
  /** HTTP implementation shared by the WhatsApp, AI and operator-media clients. */
  fetch?: FetchLike;
  responder?: AiResponder;
  now?: () => number;
  /** Replaces the typing delay wait (tests). */
  wait?: (ms: number) => Promise<void>;
}

function loadSystemPrompt(path: string, logger: Logger): string {
  if (!existsSync(path)) {
    logger.warn(`System prompt ${path} not found; using the built-in prompt`);
    return FALLBACK_SYSTEM_PROMPT;
  }
  return readFileSync(path, 'utf8').trim() || FALLBACK_SYSTEM_PROMPT;
}

/**
 * AppContext owns the service graph.
 *
 * @example
 * const context = new AppContext(loadConfig());
 * context.scheduler.start();
 * startWebhookServer(createApp(context.webhookDeps()), context.config.WEBHOOK_PORT);
 * // on shutdown
 * await context.close();
 */
export class AppContext {
  readonly logger: Logger;
  readonly db: SqliteDatabase;
  readonly conversations: ConversationStore;
  readonly messages: MessageStore;
  readonly dedup: DedupStore;
  readonly buffer: BufferStore;
  readonly sessions: SessionStore;
  readonly whatsapp: WhatsAppClient;
  readonly responder: AiResponder;
  readonly tasks: TaskRunner;
  readonly interventions: InterventionController;
  readonly router: ConversationRouter;
  readonly scheduler: DebounceScheduler;
  private closed = false;

  constructor(readonly config: EnvConfig, overrides: AppContextOverrides = {}) {
    setLogLevel(config.LOG_LEVEL);
    this.logger = createLogger('app');
    const now = overrides.now ?? Date.now;

    this.db = openDatabase(config.DATABASE_PATH);
    this.conversations = new ConversationStore(this.db, now);
    this.messages = new MessageStore(this.db, now);
    this.dedup = new DedupStore(this.db, {
      ttlMs: config.DEDUP_TTL_MS,
      now,
      seenBefore: (messageId) => this.messages.existsInbound(messageId),
    });
    this.buffer = new BufferStore(this.db, {
      debounceMs: config.DEBOUNCE_MS,
      maxWaitMs: config.MAX_WAIT_MS,
      checkIntervalMs: config.BUFFER_CHECK_INTERVAL_MS,
      now,
    });
    this.sessions = SessionStore.open(config.SESSION_DATABASE_PATH, { now });

    this.whatsapp = new WhatsAppClient({
      accessToken: config.WHATSAPP_ACCESS_TOKEN,
      phoneNumberId: config.WHATSAPP_PHONE_NUMBER_ID,
      graphUrl: config.WHATSAPP_GRAPH_URL,
      appSecret: config.APP_SECRET,
      timeoutMs: config.HTTP_TIMEOUT_MS,
      fetch: overrides.fetch,
    });

    this.responder =
      overrides.responder ??
      new ChatCompletionsResponder({
        apiKey: config.AI_API_KEY,
        baseUrl: config.AI_BASE_URL,
        model: config.AI_MODEL,
        systemPrompt: loadSystemPrompt(config.AI_SYSTEM_PROMPT_PATH, this.logger),
        historyLimit: config.AI_HISTORY_LIMIT,
        timeoutMs: config.AI_TIMEOUT_MS,
        sessions: this.sessions,
        fetch: overrides.fetch,
      });

    this.tasks = new TaskRunner({ concurrency: 4 });

    this.interventions = new InterventionController({
      db: this.db,
      conversations: this.conversations,
      messages: this.messages,
      whatsapp: this.whatsapp,
      sessions: this.sessions,
      tasks: this.tasks,
      operatorMedia: config.OPERATOR_MEDIA_BASE_URL
        ? new OperatorMediaSource({
            baseUrl: config.OPERATOR_MEDIA_BASE_URL,
            timeoutMs: config.OPERATOR_MEDIA_TIMEOUT_MS,
            fetch: overrides.fetch,
          })
        : null,
    });

    this.router = new ConversationRouter({
      db: this.db,
      conversations: this.conversations,
      messages: this.messages,
      whatsapp: this.whatsapp,
      responder: this.responder,
      interventions: this.interventions,
      config: {
        typingDelayMs: config.TYPING_DELAY_MS,
        fallbackReply: config.AI_FALLBACK_REPLY,
        aiEnabled: config.AI_ENABLED,
      },
      wait: overrides.wait,
    });

    this.scheduler = new DebounceScheduler(
      this.buffer,
      async (_key, batch) => {
        await this.router.route(combineMessages(batch));
      },
      {
        sweepIntervalMs: config.BUFFER_SWEEP_INTERVAL_MS,
        onSweep: () => {
          const purged = this.dedup.purgeExpired();
          if (purged > 0) {
            this.logger.debug(`Purged ${purged} expired dedup marker(s)`);
          }
        },
      }
    );
  }

  webhookDeps(): WebhookServerDeps {
    return {
      verifyToken: this.config.VERIFY_TOKEN,
      db: this.db,
      whatsapp: this.whatsapp,
      dedup: this.dedup,
      buffer: this.buffer,
      scheduler: this.scheduler,
      messages: this.messages,
      tasks: this.tasks,
      interventions: this.interventions,
    };
  }

  /**
   * Stop timers, let running dispatches and queued tasks finish, then
   * close both databases. Buffered batches stay in the database for the
   * next start's sweeper.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.scheduler.stop();
    await this.scheduler.idle();
    await this.tasks.close();
    await this.sessions.close();
    this.db.close();
    this.logger.info('Application context closed');
  }
}
