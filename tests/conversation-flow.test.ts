/**
 * End-to-end conversation flow
 * Webhook deliveries through buffering, routing, takeover and handback on
 * a fully wired application context
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { Express } from 'express';
import { Response, type RequestInit } from 'node-fetch';
import request from 'supertest';
import { AppContext } from '../src/app-context';
import { parseEnv } from '../src/config/env';
import type { AiReply, AiResponder } from '../src/services/ai-responder';
import type { AiContent } from '../src/services/content-formatter';
import type { FetchLike } from '../src/services/whatsapp-client';
import { callOperatorTool } from '../src/server';
import { createApp } from '../src/webhook-server';
import { PHONE, webhookBody, webhookText } from './helpers';

class RecordingResponder implements AiResponder {
  readonly prompts: AiContent[] = [];

  async respond(_threadId: string, content: AiContent): Promise<AiReply> {
    this.prompts.push(content);
    const text = this.prompts.length === 1 ? 'Sure, what would you like a quote for?' : 'You are welcome!';
    return { text, requestedIntervention: false, usage: null };
  }
}

describe('Conversation flow', () => {
  let clock: number;
  let context: AppContext;
  let app: Express;
  let responder: RecordingResponder;
  let sentTexts: string[];

  const graphFetch: FetchLike = async (_url: string, init?: RequestInit) => {
    const body: unknown = JSON.parse(String(init?.body));
    if (typeof body === 'object' && body !== null && 'text' in body) {
      const text = body.text;
      if (typeof text === 'object' && text !== null && 'body' in text && typeof text.body === 'string') {
        sentTexts.push(text.body);
      }
      return new Response(JSON.stringify({ messages: [{ id: `wamid.out${sentTexts.length}` }] }), { status: 200 });
    }
    return new Response(JSON.stringify({ success: true }), { status: 200 });
  };

  const deliver = (id: string, text: string) =>
    request(app)
      .post('/webhook')
      .send(webhookBody({ messages: [webhookText(id, text)] }));

  /** Let the debounce window pass and run the pending batch. */
  const flush = async (): Promise<void> => {
    clock += 60_000;
    context.scheduler.schedule(PHONE, 0);
    await new Promise((resolve) => setTimeout(resolve, 20));
    await context.scheduler.idle();
  };

  const thread = () => {
    const conversation = context.conversations.findByPhone(PHONE);
    return conversation ? context.messages.getByConversation(conversation.id) : [];
  };

  beforeEach(() => {
    clock = 1_700_000_000_000;
    responder = new RecordingResponder();
    sentTexts = [];
    context = new AppContext(
      parseEnv({
        WHATSAPP_ACCESS_TOKEN: 'test-access-token',
        WHATSAPP_PHONE_NUMBER_ID: '123456789012345',
        VERIFY_TOKEN: 'test-verify-token',
        AI_API_KEY: 'test-ai-key',
        DATABASE_PATH: ':memory:',
        SESSION_DATABASE_PATH: ':memory:',
        DEBOUNCE_MS: '60000',
        MAX_WAIT_MS: '120000',
        LOG_LEVEL: 'error',
      }),
      { fetch: graphFetch, responder, now: () => clock, wait: async () => undefined }
    );
    app = createApp(context.webhookDeps());
  });

  afterEach(async () => {
    await context.close();
  });

  it('should answer a burst of messages once with the combined text', async () => {
    await deliver('wamid.1', 'Hi');
    clock += 2_000;
    await deliver('wamid.2', 'I need a quote');
    await deliver('wamid.2', 'I need a quote');

    expect(context.buffer.size(PHONE)).toBe(2);
    await flush();

    expect(responder.prompts).toEqual(['Hi\nI need a quote']);
    expect(sentTexts).toEqual(['Sure, what would you like a quote for?']);
    expect(thread().map((m) => [m.senderType, m.externalId, m.text])).toEqual([
      ['customer', 'wamid.2', 'Hi\nI need a quote'],
      ['ai', 'wamid.out1', 'Sure, what would you like a quote for?'],
    ]);
    expect(context.buffer.size(PHONE)).toBe(0);
  });

  it('should hold the AI back while an operator has the conversation', async () => {
    await deliver('wamid.1', 'Hi');
    await flush();

    const takeover = await request(app).post('/api/v1/takeover').send({ phone: PHONE });
    expect(takeover.body).toMatchObject({ status: 'takeover_complete', changed: true });

    await deliver('wamid.2', 'Can I talk to someone?');
    await flush();
    expect(responder.prompts).toHaveLength(1);

    const operator = await request(app)
      .post('/api/v1/operatormsg')
      .send({ receiverPhone: PHONE, message: 'Hi, this is Sam from sales.', senderId: 'sam' });
    expect(operator.body).toEqual({ status: 'success', message_id: 'wamid.out2' });

    const handback = await request(app).post('/api/v1/handback').send({ phone: PHONE });
    expect(handback.body).toMatchObject({ status: 'handback_complete', changed: true });

    await deliver('wamid.3', 'Thanks');
    await flush();

    expect(responder.prompts).toEqual(['Hi', 'Thanks']);
    expect(sentTexts).toEqual([
      'Sure, what would you like a quote for?',
      'Hi, this is Sam from sales.',
      'You are welcome!',
    ]);
    expect(thread().map((m) => `${m.senderType}:${m.text}`)).toEqual([
      'customer:Hi',
      'ai:Sure, what would you like a quote for?',
      'customer:Can I talk to someone?',
      'operator:Hi, this is Sam from sales.',
      'customer:Thanks',
      'ai:You are welcome!',
    ]);
  });

  it('should apply delivery statuses and expose the thread to operator tools', async () => {
    await deliver('wamid.1', 'Hi');
    await flush();

    await request(app)
      .post('/webhook')
      .send(webhookBody({ statuses: [{ id: 'wamid.out1', status: 'read', recipient_id: PHONE }] }));

    const result = await callOperatorTool(context, 'get_conversation_thread', { phone: PHONE });
    const item = result.content[0];
    const text = item?.type === 'text' ? item.text : '';

    expect(JSON.parse(text)).toMatchObject({
      phone: PHONE,
      name: 'Dana',
      state: 'ACTIVE_AI',
      messages: [
        { sender: 'customer', text: 'Hi' },
        { sender: 'ai', externalId: 'wamid.out1', status: 'read' },
      ],
    });
  });
});
