/**
 * Tests for the composition root
 * Checks that each outbound client gets its configured timeout
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { Response, type RequestInit } from 'node-fetch';
import { AppContext } from '../src/app-context';
import { parseEnv } from '../src/config/env';
import type { FetchLike } from '../src/services/whatsapp-client';
import { PHONE } from './helpers';

describe('AppContext', () => {
  let context: AppContext;
  let timeouts: Array<[string, number | undefined]>;

  const fetch: FetchLike = async (url: string, init?: RequestInit) => {
    timeouts.push([url, init?.timeout]);
    if (url.endsWith('/chat/completions')) {
      return new Response(JSON.stringify({ choices: [{ message: { content: 'Hello!' } }] }), { status: 200 });
    }
    if (url.includes('/api/v1/get-sent-media')) {
      return new Response('file-bytes', { status: 200 });
    }
    if (url.endsWith('/media')) {
      return new Response(JSON.stringify({ id: 'uploaded-1' }), { status: 200 });
    }
    return new Response(JSON.stringify({ messages: [{ id: 'wamid.out1' }] }), { status: 200 });
  };

  beforeEach(() => {
    timeouts = [];
    context = new AppContext(
      parseEnv({
        WHATSAPP_ACCESS_TOKEN: 'test-access-token',
        WHATSAPP_PHONE_NUMBER_ID: '123456789012345',
        VERIFY_TOKEN: 'test-verify-token',
        AI_API_KEY: 'test-ai-key',
        DATABASE_PATH: ':memory:',
        SESSION_DATABASE_PATH: ':memory:',
        OPERATOR_MEDIA_BASE_URL: 'https://operator.example.com',
        HTTP_TIMEOUT_MS: '15000',
        AI_TIMEOUT_MS: '4500',
        OPERATOR_MEDIA_TIMEOUT_MS: '9000',
        LOG_LEVEL: 'error',
      }),
      { fetch }
    );
  });

  afterEach(async () => {
    await context.close();
  });

  it('should pass the AI timeout to the responder', async () => {
    await expect(context.responder.respond(PHONE, 'Hi')).resolves.toMatchObject({ text: 'Hello!' });

    expect(timeouts).toEqual([['https://api.openai.com/v1/chat/completions', 4500]]);
  });

  it('should pass the media and Graph timeouts to operator media delivery', async () => {
    context.conversations.create(PHONE);

    await expect(
      context.interventions.sendOperatorMessage({
        phone: PHONE,
        message: 'Your invoice',
        senderId: 'sam',
        media: { fileId: 'f1', mimeType: 'application/pdf' },
      })
    ).resolves.toMatchObject({ status: 'accepted' });
    await context.tasks.onIdle();

    expect(timeouts).toEqual([
      ['https://operator.example.com/api/v1/get-sent-media?fileId=f1&type=application%2Fpdf', 9000],
      ['https://graph.facebook.com/v23.0/123456789012345/media', 15000],
      ['https://graph.facebook.com/v23.0/123456789012345/messages', 15000],
    ]);
  });
});
