/**
 * Tests for combineMessages
 */

import { describe, it, expect } from '@jest/globals';
import { combineMessages } from '../../src/services/message-combiner';
import { mediaMessage, textMessage } from '../helpers';

describe('combineMessages', () => {
  it('should refuse an empty batch', () => {
    expect(() => combineMessages([])).toThrow('Cannot combine an empty batch');
  });

  it('should return a single message unchanged', () => {
    const message = textMessage('wamid.1', 'Hi');
    expect(combineMessages([message])).toBe(message);
  });

  it('should join text bodies with newlines', () => {
    const combined = combineMessages([
      textMessage('wamid.1', 'Hi', { timestamp: 100 }),
      textMessage('wamid.2', 'I need a quote', { timestamp: 105, replyTo: 'wamid.0' }),
    ]);

    expect(combined).toEqual({
      kind: 'text',
      category: null,
      direction: 'inbound',
      timestamp: 105,
      phone: '15551234567',
      name: 'Dana',
      messageId: 'wamid.2',
      text: 'Hi\nI need a quote',
      mediaId: null,
      mimeType: null,
      replyTo: 'wamid.0',
    });
  });

  it('should skip blank bodies', () => {
    const combined = combineMessages([textMessage('wamid.1', '  '), textMessage('wamid.2', 'Hello')]);
    expect(combined.text).toBe('Hello');
  });

  it('should take phone and name from the first message', () => {
    const combined = combineMessages([
      textMessage('wamid.1', 'a', { name: 'Dana' }),
      textMessage('wamid.2', 'b', { name: null }),
    ]);
    expect(combined.name).toBe('Dana');
  });

  it('should carry the last media item and every caption', () => {
    const combined = combineMessages([
      textMessage('wamid.1', 'Look at these', { timestamp: 100 }),
      mediaMessage('wamid.2', 'image', 'media-a', 'image/jpeg', 'front', { timestamp: 101 }),
      mediaMessage('wamid.3', 'image', 'media-b', 'image/png', null, { timestamp: 102, replyTo: 'wamid.x' }),
      textMessage('wamid.4', 'thanks', { timestamp: 103 }),
    ]);

    expect(combined.kind).toBe('media');
    expect(combined.category).toBe('image');
    expect(combined.mediaId).toBe('media-b');
    expect(combined.mimeType).toBe('image/png');
    expect(combined.messageId).toBe('wamid.3');
    expect(combined.timestamp).toBe(102);
    expect(combined.replyTo).toBe('wamid.x');
    expect(combined.text).toBe('Look at these\nfront\nthanks');
  });

  it('should give media without any text a null body', () => {
    const combined = combineMessages([
      mediaMessage('wamid.1', 'audio', 'media-a', 'audio/ogg'),
      mediaMessage('wamid.2', 'audio', 'media-b', 'audio/ogg'),
    ]);
    expect(combined.text).toBeNull();
    expect(combined.mediaId).toBe('media-b');
  });
});
