/**
 * Shared builders for tests
 */

import type { CanonicalMessage, MediaCategory } from '../src/types/models';
import type { Logger } from '../src/utils/logger';

export const PHONE = '15551234567';

export function textMessage(messageId: string, text: string, overrides: Partial<CanonicalMessage> = {}): CanonicalMessage {
  return {
    kind: 'text',
    category: null,
    direction: 'inbound',
    timestamp: 1_700_000_000,
    phone: PHONE,
    name: 'Dana',
    messageId,
    text,
    mediaId: null,
    mimeType: null,
    replyTo: null,
    ...overrides,
  };
}

export function mediaMessage(
  messageId: string,
  category: MediaCategory,
  mediaId: string,
  mimeType: string,
  caption: string | null = null,
  overrides: Partial<CanonicalMessage> = {}
): CanonicalMessage {
  return {
    kind: 'media',
    category,
    direction: 'inbound',
    timestamp: 1_700_000_000,
    phone: PHONE,
    name: 'Dana',
    messageId,
    text: caption,
    mediaId,
    mimeType,
    replyTo: null,
    ...overrides,
  };
}

/**
 * Cloud API webhook body carrying the given `messages` and `statuses`.
 */
export function webhookBody(
  options: { messages?: unknown[]; statuses?: unknown[]; contacts?: unknown[] } = {}
): Record<string, unknown> {
  return {
    object: 'whatsapp_business_account',
    entry: [
      {
        id: '102290129340398',
        changes: [
          {
            field: 'messages',
            value: {
              messaging_product: 'whatsapp',
              metadata: { display_phone_number: '15550009999', phone_number_id: '123456789012345' },
              contacts: options.contacts ?? [{ wa_id: PHONE, profile: { name: 'Dana' } }],
              ...(options.messages ? { messages: options.messages } : {}),
              ...(options.statuses ? { statuses: options.statuses } : {}),
            },
          },
        ],
      },
    ],
  };
}

export function webhookText(id: string, body: string, from: string = PHONE, timestamp: string = '1700000000') {
  return { from, id, timestamp, type: 'text', text: { body } };
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

/**
 * Logger that keeps `LEVEL message` lines in memory.
 */
export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const write =
    (level: string) =>
    (message: string): void => {
      lines.push(`${level} ${message}`);
    };
  const logger: RecordingLogger = {
    lines,
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: () => logger,
  };
  return logger;
}
