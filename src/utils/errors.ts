/**
 * @fileoverview Typed errors raised by the storage, provider and AI layers
 *
 * @module utils/errors
 * @license MIT
 */

/** Deduplication store could not answer. Callers treat the message as new. */
export class DeduplicationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DeduplicationError';
  }
}

/** Message buffer could not persist or drain a batch. */
export class BufferStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'BufferStoreError';
  }
}

/**
 * Graph API errors that have a known remedy, keyed by error code.
 */
export const WHATSAPP_ERROR_HINTS: Readonly<Record<number, string>> = {
  0: 'AuthException. Get a new access token.',
  3: 'Failed API method. Check app permissions.',
  10: 'Permission denied.',
  190: 'Access token expired.',
  368: 'Temporarily blocked due to policy violations.',
};

/**
 * Non-2xx response (or transport failure) from the WhatsApp Cloud API.
 *
 * @description
 * `status` is the HTTP status (0 for timeouts and network failures),
 * `code` the Graph error code when the body carried one, and `hint` the
 * remedy for known codes.
 */
export class WhatsAppApiError extends Error {
  readonly hint: string | null;

  constructor(
    message: string,
    public readonly status: number,
    public readonly code: number | null = null
  ) {
    super(message);
    this.name = 'WhatsAppApiError';
    this.hint = code !== null ? WHATSAPP_ERROR_HINTS[code] ?? null : null;
  }

  /** Rate limiting and server-side failures are worth retrying. */
  get retriable(): boolean {
    return this.status === 0 || this.status === 429 || (this.status >= 500 && this.status < 600);
  }
}

/** AI backend failed or answered with something unusable. */
export class AiResponderError extends Error {
  constructor(message: string, public readonly status: number | null = null) {
    super(message);
    this.name = 'AiResponderError';
  }
}

export class ConversationNotFoundError extends Error {
  constructor(public readonly phone: string) {
    super(`Conversation not found for ${phone}`);
    this.name = 'ConversationNotFoundError';
  }
}

/**
 * Render any thrown value as a short message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
