/**
 * @fileoverview WhatsApp Cloud API client wrapper
 *
 * This module wraps the Graph API endpoints the service uses: sending text
 * and media messages, read receipts with a typing indicator, resolving and
 * downloading inbound media, uploading outbound media, and validating the
 * `X-Hub-Signature-256` header of incoming webhooks.
 *
 * @module services/whatsapp-client
 * @license MIT
 */

import crypto from 'node:crypto';
import FormData from 'form-data';
import nodeFetch, { type RequestInit, type Response } from 'node-fetch';
import { z } from 'zod';
import { WhatsAppApiError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** Fetch signature used by every HTTP client in the service. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** Media kinds WhatsApp accepts in outbound messages. */
export type OutboundMediaKind = 'image' | 'audio' | 'video' | 'document' | 'sticker';

const CAPTIONED_KINDS: ReadonlySet<OutboundMediaKind> = new Set(['image', 'video', 'document']);

export interface WhatsAppClientOptions {
  accessToken: string;
  phoneNumberId: string;
  /** Graph base URL including the version, without trailing slash. */
  graphUrl: string;
  /** Enables webhook signature validation when set. */
  appSecret?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface SendResult {
  /** WhatsApp message id (`wamid...`) of the accepted message. */
  messageId: string;
}

export interface MediaUrl {
  url: string;
  mimeType: string;
  fileSize: number | null;
}

export interface DownloadedMedia {
  data: Buffer;
  mimeType: string;
}

const sendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).min(1),
});

const mediaUrlSchema = z.object({
  url: z.string().url(),
  mime_type: z.string(),
  file_size: z.coerce.number().optional(),
});

const uploadResponseSchema = z.object({ id: z.string() });

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.number().optional(),
  }),
});

/**
 * WhatsAppClient talks to the Graph API on behalf of one business phone
 * number.
 *
 * @description
 * Every call has a timeout. Non-2xx responses become {@link WhatsAppApiError}
 * carrying the HTTP status, the Graph error code and, for known codes, a
 * remedy hint. Timeouts and network failures use status 0.
 *
 * @example
 * const client = new WhatsAppClient({
 *   accessToken: 'test-token',
 *   phoneNumberId: '1234567890',
 *   graphUrl: 'https://graph.facebook.com/v23.0',
 * });
 *
 * const { messageId } = await client.sendText('15551234567', 'Hello!');
 */
export class WhatsAppClient {
  private readonly fetch: FetchLike;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: WhatsAppClientOptions) {
    this.fetch = options.fetch ?? nodeFetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.logger = options.logger ?? createLogger('whatsapp');
  }

  private get messagesUrl(): string {
    return `${this.options.graphUrl}/${this.options.phoneNumberId}/messages`;
  }

  private authHeader(): Record<string, string> {
    return { Authorization: `Bearer ${this.options.accessToken}` };
  }

  /**
   * Send a plain text message.
   *
   * @throws {WhatsAppApiError} If the Graph API rejects the message
   */
  async sendText(to: string, body: string): Promise<SendResult> {
    const data = await this.postJson(this.messagesUrl, {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to,
      type: 'text',
      text: { body },
    });
    return this.parseSendResult(data);
  }

  /**
   * Send previously uploaded media. The caption is dropped for kinds that
   * do not take one (audio, sticker).
   *
   * @throws {WhatsAppApiError} If the Graph API rejects the message
   */
  async sendMedia(kind: OutboundMediaKind, to: string, mediaId: string, caption?: string): Promise<SendResult> {
    const media: Record<string, string> = { id: mediaId };
    if (caption && CAPTIONED_KINDS.has(kind)) {
      media.caption = caption;
    }
    const data = await this.postJson(this.messagesUrl, {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to,
      type: kind,
      [kind]: media,
    });
    return this.parseSendResult(data);
  }

  /**
   * Mark an inbound message as read and show the typing indicator.
   *
   * @returns false instead of throwing; the indicator is cosmetic
   */
  async sendTypingIndicator(messageId: string): Promise<boolean> {
    try {
      await this.postJson(this.messagesUrl, {
        messaging_product: 'whatsapp',
        status: 'read',
        message_id: messageId,
        typing_indicator: { type: 'text' },
      });
      return true;
    } catch (error) {
      this.logger.warn(`Typing indicator failed for ${messageId}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Resolve a media id to its short-lived download URL.
   *
   * @throws {WhatsAppApiError} If the media id is unknown or expired
   */
  async getMediaUrl(mediaId: string): Promise<MediaUrl> {
    const response = await this.request(`${this.options.graphUrl}/${encodeURIComponent(mediaId)}`, {
      method: 'GET',
      headers: this.authHeader(),
    });
    const parsed = mediaUrlSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new WhatsAppApiError(`Unexpected media lookup response for ${mediaId}`, response.status);
    }
    return {
      url: parsed.data.url,
      mimeType: parsed.data.mime_type,
      fileSize: parsed.data.file_size ?? null,
    };
  }

  /**
   * Download inbound media bytes.
   *
   * @throws {WhatsAppApiError} If the lookup or the download fails
   */
  async downloadMedia(mediaId: string): Promise<DownloadedMedia> {
    const { url, mimeType } = await this.getMediaUrl(mediaId);
    const response = await this.request(url, { method: 'GET', headers: this.authHeader() });
    return { data: await response.buffer(), mimeType };
  }

  /**
   * Upload a file for later sending.
   *
   * @returns The media id to pass to {@link sendMedia}
   * @throws {WhatsAppApiError} If the upload is rejected
   */
  async uploadMedia(data: Buffer, filename: string, mimeType: string): Promise<string> {
    const form = new FormData();
    form.append('messaging_product', 'whatsapp');
    form.append('type', mimeType);
    form.append('file', data, { filename, contentType: mimeType });

    const response = await this.request(`${this.options.graphUrl}/${this.options.phoneNumberId}/media`, {
      method: 'POST',
      headers: { ...form.getHeaders(), ...this.authHeader() },
      body: form,
    });
    const parsed = uploadResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new WhatsAppApiError(`Upload of ${filename} returned no media id`, response.status);
    }
    this.logger.info(`Uploaded ${filename} (${mimeType}) as media ${parsed.data.id}`);
    return parsed.data.id;
  }

  /**
   * Check the `X-Hub-Signature-256` header against the raw request body.
   *
   * @returns true when no app secret is configured
   */
  validateSignature(rawBody: Buffer, signatureHeader: string | undefined): boolean {
    if (!this.options.appSecret) return true;
    if (!signatureHeader) return false;

    const match = signatureHeader.match(/^sha256=([0-9a-f]+)$/i);
    if (!match) return false;

    const expected = crypto.createHmac('sha256', this.options.appSecret).update(rawBody).digest('hex');
    const a = Buffer.from(match[1].toLowerCase(), 'utf8');
    const b = Buffer.from(expected, 'utf8');
    return a.length === b.length && crypto.timingSafeEqual(a, b);
  }

  private parseSendResult(data: unknown): SendResult {
    const parsed = sendResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new WhatsAppApiError('Send response carried no message id', 200);
    }
    return { messageId: parsed.data.messages[0].id };
  }

  private async postJson(url: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await this.request(url, {
      method: 'POST',
      headers: { ...this.authHeader(), 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    return this.readJson(response);
  }

  /**
   * Perform a request, turning transport failures and non-2xx responses
   * into {@link WhatsAppApiError}.
   */
  private async request(url: string, init: RequestInit): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetch(url, { ...init, timeout: this.timeoutMs });
    } catch (error) {
      throw new WhatsAppApiError(`Request to WhatsApp failed: ${errorMessage(error)}`, 0);
    }

    if (response.ok) {
      return response;
    }

    const parsed = graphErrorSchema.safeParse(await this.readJson(response));
    const code = parsed.success ? parsed.data.error.code ?? null : null;
    const detail = parsed.success ? parsed.data.error.message ?? 'Unknown error' : `HTTP ${response.status}`;
    const error = new WhatsAppApiError(`WhatsApp API error: ${detail}`, response.status, code);
    this.logger.error(
      `Graph API returned ${response.status}${code !== null ? ` (code ${code})` : ''}: ${detail}` +
        (error.hint ? ` - ${error.hint}` : '')
    );
    throw error;
  }

  private async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    if (!text) return {};
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch {
      return { raw: text };
    }
  }
}
