/**
 * Tests for the content formatter
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildAiInput,
  categoryForMime,
  contentToHistoryText,
  formatContent,
  type ContentSources,
} from '../../src/services/content-formatter';
import type { Message } from '../../src/types/models';
import { mediaMessage, textMessage } from '../helpers';

function storedMessage(overrides: Partial<Message>): Message {
  return {
    id: 1,
    conversationId: 1,
    direction: 'outbound',
    senderType: 'ai',
    senderId: null,
    externalId: 'wamid.quoted',
    hasText: true,
    text: null,
    media: null,
    status: 'sent',
    errorCode: null,
    errorMessage: null,
    providerTimestamp: null,
    createdAt: new Date(0),
    metadata: null,
    ...overrides,
  };
}

function sources(stored: Message[] = [], failing: string[] = []): ContentSources {
  return {
    messages: {
      getByExternalId: (externalId) => stored.find((m) => m.externalId === externalId) ?? null,
    },
    whatsapp: {
      downloadMedia: async (mediaId) => {
        if (failing.includes(mediaId)) throw new Error('media expired');
        return { data: Buffer.from(`bytes-${mediaId}`), mimeType: mediaId.startsWith('img') ? 'image/png' : 'audio/ogg' };
      },
    },
  };
}

describe('categoryForMime', () => {
  it.each([
    ['image/webp', 'image'],
    ['video/mp4', 'video'],
    ['audio/ogg', 'audio'],
    ['application/pdf', 'document'],
    [null, 'document'],
  ])('%s is %s', (mimeType, category) => {
    expect(categoryForMime(mimeType)).toBe(category);
  });
});

describe('buildAiInput', () => {
  it('should pass plain text through', async () => {
    await expect(buildAiInput(textMessage('m1', 'Hi'), sources())).resolves.toEqual({
      text: 'Hi',
      attachment: null,
      context: null,
    });
  });

  it('should download attached media', async () => {
    const input = await buildAiInput(mediaMessage('m1', 'image', 'img-1', 'image/png', 'Look'), sources());

    expect(input.text).toBe('Look');
    expect(input.attachment).toEqual({
      status: 'downloaded',
      category: 'image',
      mimeType: 'image/png',
      data: Buffer.from('bytes-img-1'),
    });
  });

  it('should turn a failed download into an unavailable attachment', async () => {
    const input = await buildAiInput(mediaMessage('m1', 'audio', 'aud-1', 'audio/ogg'), sources([], ['aud-1']));

    expect(input.attachment).toEqual({ status: 'unavailable', category: 'audio', reason: 'media expired' });
  });

  it('should resolve a quoted text message', async () => {
    const quoted = storedMessage({ text: 'Our price is 40 EUR' });

    const input = await buildAiInput(textMessage('m1', 'Why so much?', { replyTo: 'wamid.quoted' }), sources([quoted]));

    expect(input.context).toEqual({ kind: 'text', text: 'Our price is 40 EUR' });
  });

  it('should download quoted media', async () => {
    const quoted = storedMessage({ hasText: false, media: { id: 'img-9', mimeType: 'image/png', description: 'image' } });

    const input = await buildAiInput(textMessage('m1', 'This one', { replyTo: 'wamid.quoted' }), sources([quoted]));

    expect(input.context?.kind).toBe('media');
    if (input.context?.kind === 'media') {
      expect(input.context.attachment).toMatchObject({ status: 'downloaded', category: 'image' });
    }
  });

  it('should ignore a reply to an unknown message', async () => {
    const input = await buildAiInput(textMessage('m1', 'Hm', { replyTo: 'wamid.gone' }), sources());

    expect(input.context).toBeNull();
  });
});

describe('formatContent', () => {
  it('should return plain text unchanged', () => {
    expect(formatContent({ text: 'Hi', attachment: null, context: null })).toBe('Hi');
  });

  it('should frame a reply to text', () => {
    expect(formatContent({ text: 'Why?', attachment: null, context: { kind: 'text', text: 'It is closed' } })).toBe(
      "The user's reply message is: Why?\n" +
        'The previous message in the conversation was: It is closed\n' +
        'Answer the reply in light of the previous message without repeating it.'
    );
  });

  it('should inline images as data URLs', () => {
    const content = formatContent({
      text: 'Look',
      attachment: { status: 'downloaded', category: 'image', mimeType: 'image/png', data: Buffer.from('png') },
      context: null,
    });

    expect(content).toEqual([
      { type: 'text', text: 'User sent a image with the caption: Look.' },
      { type: 'image_url', image_url: { url: `data:image/png;base64,${Buffer.from('png').toString('base64')}` } },
    ]);
  });

  it('should describe non-image media', () => {
    const content = formatContent({
      text: null,
      attachment: { status: 'downloaded', category: 'audio', mimeType: 'audio/ogg', data: Buffer.from('12345') },
      context: null,
    });

    expect(content).toEqual([
      { type: 'text', text: 'User sent a audio without a caption.' },
      { type: 'text', text: '[audio attachment (audio/ogg, 5 bytes) not shown]' },
    ]);
  });

  it('should mention media that could not be retrieved', () => {
    const content = formatContent({
      text: null,
      attachment: { status: 'unavailable', category: 'video', reason: 'media expired' },
      context: null,
    });

    expect(content).toEqual([
      { type: 'text', text: 'User sent a video without a caption.' },
      { type: 'text', text: '[The video could not be retrieved: media expired]' },
    ]);
  });

  it('should put a quoted image before the reply', () => {
    const content = formatContent({
      text: 'This one',
      attachment: null,
      context: {
        kind: 'media',
        attachment: { status: 'downloaded', category: 'sticker', mimeType: 'application/octet-stream', data: Buffer.from('s') },
      },
    });

    expect(content).toEqual([
      { type: 'text', text: 'The user replied to a sticker with: This one\nAnswer using what the sticker shows.' },
      { type: 'image_url', image_url: { url: `data:image/jpeg;base64,${Buffer.from('s').toString('base64')}` } },
    ]);
  });
});

describe('contentToHistoryText', () => {
  it('should join text parts and mark images', () => {
    expect(
      contentToHistoryText([
        { type: 'text', text: 'caption' },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,AA' } },
      ])
    ).toBe('caption\n[image]');
    expect(contentToHistoryText('plain')).toBe('plain');
  });
});
