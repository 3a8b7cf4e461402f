/**
 * @fileoverview Express server for WhatsApp webhooks and operator actions
 *
 * This module builds the HTTP application:
 * - `GET /webhook` answers the Cloud API verification challenge
 * - `POST /webhook` validates the signature, normalizes the payload, gates
 *   each inbound message through the deduplicator and buffers it; status
 *   updates are applied to stored messages
 * - operator routes (takeover, handback, operator messages, media lookup)
 *   are mounted under `/api/v1` and, for older clients, at the root
 *
 * The webhook answers `200 OK` for everything it accepted, including
 * payloads it ignores, so the provider does not start a retry storm. The
 * one exception is a buffering failure: the message is then unacknowledged
 * (503) and its dedup marker released so the provider's retry is processed.
 *
 * @module webhook-server
 * @license MIT
 */

import type { IncomingMessage, Server } from 'node:http';
import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response, Router } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { z } from 'zod';
import type { BufferStore } from './storage/buffer-store.js';
import { pingDatabase, type SqliteDatabase } from './storage/database.js';
import type { DedupStore } from './storage/dedup-store.js';
import type { MessageStore } from './storage/message-store.js';
import type { DebounceScheduler } from './services/debounce-scheduler.js';
import type { InterventionController, InterventionResult } from './services/intervention-controller.js';
import { normalizeWebhookPayload } from './services/payload-normalizer.js';
import type { TaskRunner } from './services/task-runner.js';
import type { WhatsAppClient } from './services/whatsapp-client.js';
import type { CanonicalMessage, StatusUpdate } from './types/models.js';
import { WhatsAppApiError, errorMessage } from './utils/errors.js';
import { createAccessLogStream, createLogger, type Logger } from './utils/logger.js';
import { MAX_TEXT_LENGTH, formatValidationError, phoneField } from './utils/validation.js';

export interface WebhookServerDeps {
  verifyToken: string;
  db: SqliteDatabase;
  whatsapp: Pick<WhatsAppClient, 'validateSignature' | 'getMediaUrl'>;
  dedup: DedupStore;
  buffer: BufferStore;
  scheduler: Pick<DebounceScheduler, 'schedule'>;
  messages: MessageStore;
  tasks: TaskRunner;
  interventions: Pick<InterventionController, 'takeover' | 'handback' | 'sendOperatorMessage'>;
  logger?: Logger;
}

/** Buffer and dedup key for a message: one conversation per customer phone. */
export function conversationKey(message: CanonicalMessage): string {
  return message.phone;
}

const phoneBodySchema = z.object({ phone: phoneField });

const operatorMessageSchema = z
  .object({
    receiverPhone: phoneField,
    message: z
      .string({ required_error: 'is required' })
      .max(MAX_TEXT_LENGTH, `must be at most ${MAX_TEXT_LENGTH} characters`),
    senderId: z.union([z.string().min(1), z.number()], { required_error: 'is required' }).transform(String),
    media: z.string().min(1).optional().nullable(),
    mimeType: z.string().min(1).optional().nullable(),
  })
  .refine((body) => !body.media || !!body.mimeType, {
    message: 'is required when media is sent',
    path: ['mimeType'],
  })
  .refine((body) => !!body.media || body.message.trim() !== '', {
    message: 'must not be empty',
    path: ['message'],
  });

function sendError(res: Response, status: number, message: string, extra: Record<string, unknown> = {}): void {
  res.status(status).json({ status: 'error', message, ...extra });
}

/**
 * Build the Express application.
 *
 * @example
 * const app = createApp(context.webhookDeps());
 * startWebhookServer(app, 3000);
 */
export function createApp(deps: WebhookServerDeps): Express {
  const logger = deps.logger ?? createLogger('http');
  const rawBodies = new WeakMap<IncomingMessage, Buffer>();

  const app = express();
  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors());
  app.use(morgan('tiny', { stream: createAccessLogStream(logger.child('access')) }));
  app.use(
    express.json({
      limit: '5mb',
      verify: (req, _res, buf) => {
        rawBodies.set(req, buf);
      },
    })
  );

  /**
   * Health check with database and deduplicator status.
   *
   * @route GET /health
   */
  app.get('/health', (_req, res) => {
    const database = pingDatabase(deps.db);
    const dedup = deps.dedup.stats();
    const healthy = database && dedup.healthy;
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      service: 'wa-relay',
      timestamp: new Date().toISOString(),
      database: database ? 'ok' : 'error',
      dedup,
      pendingTasks: deps.tasks.pending,
    });
  });

  /**
   * Webhook verification handshake.
   *
   * @route GET /webhook
   */
  app.get('/webhook', (req, res) => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    if (mode === 'subscribe' && token === deps.verifyToken && typeof challenge === 'string') {
      logger.info('Webhook verified');
      res.status(200).type('text/plain').send(challenge);
      return;
    }
    logger.warn('Webhook verification rejected');
    res.status(403).send('Invalid Token');
  });

  /**
   * Inbound messages and delivery statuses.
   *
   * @route POST /webhook
   */
  app.post('/webhook', (req, res) => {
    const rawBody = rawBodies.get(req) ?? Buffer.alloc(0);
    if (!deps.whatsapp.validateSignature(rawBody, req.get('x-hub-signature-256'))) {
      logger.warn('Rejected webhook with invalid signature');
      res.status(403).send('Invalid signature');
      return;
    }

    let bufferFailed = false;
    for (const event of normalizeWebhookPayload(req.body)) {
      switch (event.type) {
        case 'inbound':
          if (!acceptInbound(event.message)) {
            bufferFailed = true;
          }
          break;
        case 'status':
          applyStatus(event.update);
          break;
        case 'unsupported':
          logger.warn(`Ignoring webhook event: ${event.reason}${event.messageId ? ` (${event.messageId})` : ''}`);
          break;
      }
    }

    if (bufferFailed) {
      res.status(503).send('Service Unavailable');
      return;
    }
    res.status(200).send('OK');
  });

  /**
   * Dedup gate then buffer. Returns false only when buffering failed.
   */
  function acceptInbound(message: CanonicalMessage): boolean {
    const key = conversationKey(message);

    let duplicate = false;
    try {
      duplicate = deps.dedup.isDuplicate(message.messageId, key);
    } catch (error) {
      logger.error(`Deduplication unavailable for ${message.messageId}; processing anyway:`, error);
    }
    if (duplicate) {
      logger.info(`Duplicate delivery ${message.messageId} dropped`);
      return true;
    }

    try {
      const { isFirstOfBatch, size } = deps.buffer.addMessage(key, message);
      if (isFirstOfBatch) {
        deps.scheduler.schedule(key);
      }
      logger.debug(`Buffered ${message.messageId} for ${key} (batch size ${size})`);
      return true;
    } catch (error) {
      logger.error(`Buffering failed for ${message.messageId}:`, error);
      try {
        deps.dedup.release(message.messageId, key);
      } catch (releaseError) {
        logger.error(`Could not release dedup marker for ${message.messageId}:`, releaseError);
      }
      return false;
    }
  }

  /**
   * Apply a delivery status. A status can outrun the insert of the message
   * it refers to, so unknown ids are retried in the background.
   */
  function applyStatus(update: StatusUpdate): void {
    try {
      const result = deps.messages.updateStatus(update.messageId, update.status, update.error);
      if (result !== 'not_found') {
        logger.debug(`Status ${update.status} for ${update.messageId}: ${result}`);
        return;
      }
      deps.tasks.enqueue(
        `status:${update.messageId}`,
        () => {
          if (deps.messages.updateStatus(update.messageId, update.status, update.error) === 'not_found') {
            throw new Error(`No stored message ${update.messageId} for status ${update.status}`);
          }
        },
        { retries: 5, baseDelayMs: 1_000, maxDelayMs: 15_000 }
      );
    } catch (error) {
      logger.error(`Failed to apply status ${update.status} for ${update.messageId}:`, error);
    }
  }

  const operatorRoutes = createOperatorRouter(deps, logger);
  app.use('/api/v1', operatorRoutes);
  app.use('/', operatorRoutes);

  // Malformed JSON: acknowledge webhooks, reject everything else.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const isParseError =
      typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
    if (isParseError && req.path === '/webhook') {
      logger.warn('Ignoring webhook with malformed JSON');
      res.status(200).send('OK');
      return;
    }
    if (isParseError) {
      sendError(res, 400, 'Request body is not valid JSON');
      return;
    }
    logger.error(`Unhandled error on ${req.method} ${req.path}:`, error);
    sendError(res, 500, 'Internal server error');
  });

  return app;
}

function interventionResponse(res: Response, result: InterventionResult, phone: string): void {
  if (result.status === 'not_found') {
    sendError(res, 404, `Conversation not found for ${phone}`);
    return;
  }
  res.status(200).json({
    status: result.status,
    phone,
    changed: result.changed,
    conversationId: result.conversationId,
  });
}

/**
 * Operator routes.
 */
function createOperatorRouter(deps: WebhookServerDeps, logger: Logger): Router {
  const router = Router();

  /**
   * Hand a conversation to a human operator.
   *
   * @route POST /takeover
   * @param {string} req.body.phone - Customer phone
   */
  router.post('/takeover', async (req, res) => {
    const parsed = phoneBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendError(res, 400, formatValidationError(parsed.error));
      return;
    }
    try {
      interventionResponse(res, await deps.interventions.takeover(parsed.data.phone, 'operator'), parsed.data.phone);
    } catch (error) {
      logger.error(`Takeover failed for ${parsed.data.phone}:`, error);
      sendError(res, 500, 'Takeover failed');
    }
  });

  /**
   * Return a conversation to the AI.
   *
   * @route POST /handback
   * @param {string} req.body.phone - Customer phone
   */
  router.post('/handback', async (req, res) => {
    const parsed = phoneBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendError(res, 400, formatValidationError(parsed.error));
      return;
    }
    try {
      interventionResponse(res, await deps.interventions.handback(parsed.data.phone), parsed.data.phone);
    } catch (error) {
      logger.error(`Handback failed for ${parsed.data.phone}:`, error);
      sendError(res, 500, 'Handback failed');
    }
  });

  router.get('/operatormsg', (_req, res) => {
    res.status(200).type('text/plain').send('Operator message endpoint is up');
  });

  /**
   * Send a message written by an operator. Media is delivered in the
   * background and answered with 202.
   *
   * @route POST /operatormsg
   */
  router.post('/operatormsg', async (req, res) => {
    const parsed = operatorMessageSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendError(res, 400, formatValidationError(parsed.error));
      return;
    }
    const body = parsed.data;

    try {
      const result = await deps.interventions.sendOperatorMessage({
        phone: body.receiverPhone,
        message: body.message,
        senderId: body.senderId,
        media: body.media && body.mimeType ? { fileId: body.media, mimeType: body.mimeType } : null,
      });

      switch (result.status) {
        case 'sent':
          res.status(200).json({ status: 'success', message_id: result.messageId });
          return;
        case 'accepted':
          res.status(202).json({
            status: 'accepted',
            message: 'Media message queued for processing',
            task_id: result.taskId,
          });
          return;
        case 'not_found':
          sendError(res, 404, `Conversation not found for ${body.receiverPhone}`);
          return;
        case 'media_unavailable':
          sendError(res, 503, 'Operator media backend is not configured');
          return;
      }
    } catch (error) {
      if (error instanceof WhatsAppApiError) {
        logger.error(`WhatsApp rejected operator message to ${body.receiverPhone}: ${error.message}`);
        sendError(res, 502, error.message, { code: error.code, hint: error.hint });
        return;
      }
      logger.error(`Operator message to ${body.receiverPhone} failed:`, error);
      sendError(res, 500, errorMessage(error));
    }
  });

  /**
   * Resolve a WhatsApp media id to its download URL.
   *
   * @route GET /media?id=
   */
  router.get('/media', async (req, res) => {
    const id = req.query.id;
    if (typeof id !== 'string' || id.trim() === '') {
      sendError(res, 400, 'Missing media id');
      return;
    }
    try {
      const media = await deps.whatsapp.getMediaUrl(id.trim());
      res.status(200).json({ status: 'success', ...media });
    } catch (error) {
      const status = error instanceof WhatsAppApiError ? 502 : 500;
      logger.error(`Media lookup failed for ${id}:`, error);
      sendError(res, status, errorMessage(error));
    }
  });

  return router;
}

/**
 * Start listening.
 */
export function startWebhookServer(app: Express, port: number, logger: Logger = createLogger('http')): Server {
  return app.listen(port, () => {
    logger.info(`Webhook server listening on port ${port}`);
    logger.info(`Webhook endpoint: /webhook, operator API: /api/v1`);
  });
}
