/**
 * Tests for MessageStore
 * Tests message insertion, thread reads and monotonic status updates
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { openDatabase, type SqliteDatabase } from '../../src/storage/database';
import { ConversationStore } from '../../src/storage/conversation-store';
import { MessageStore, canTransition } from '../../src/storage/message-store';
import type { MessageStatus, NewMessage } from '../../src/types/models';

describe('canTransition', () => {
  it.each<[MessageStatus, MessageStatus, boolean]>([
    ['pending', 'sent', true],
    ['sent', 'delivered', true],
    ['delivered', 'read', true],
    ['pending', 'read', true],
    ['read', 'delivered', false],
    ['delivered', 'sent', false],
    ['sent', 'sent', false],
    ['pending', 'failed', true],
    ['sent', 'failed', true],
    ['delivered', 'failed', false],
    ['read', 'failed', false],
    ['failed', 'read', false],
    ['failed', 'failed', false],
  ])('%s -> %s is %p', (current, next, expected) => {
    expect(canTransition(current, next)).toBe(expected);
  });
});

describe('MessageStore', () => {
  let db: SqliteDatabase;
  let store: MessageStore;
  let conversationId: number;

  const inbound = (externalId: string, text: string | null = 'Hi'): NewMessage => ({
    conversationId,
    direction: 'inbound',
    senderType: 'customer',
    externalId,
    text,
  });

  beforeEach(() => {
    db = openDatabase(':memory:');
    conversationId = new ConversationStore(db).create('15551234567').id;
    store = new MessageStore(db, () => 1_700_000_000_000);
  });

  afterEach(() => {
    db.close();
  });

  describe('insert', () => {
    it('should store a message as pending', () => {
      const message = store.insert({
        ...inbound('wamid.1', 'Hello'),
        providerTimestamp: new Date(1_700_000_000_000),
        metadata: { replyTo: 'wamid.0' },
      });

      expect(message).not.toBeNull();
      expect(message?.status).toBe('pending');
      expect(message?.hasText).toBe(true);
      expect(message?.text).toBe('Hello');
      expect(message?.media).toBeNull();
      expect(message?.metadata).toEqual({ replyTo: 'wamid.0' });
      expect(message?.providerTimestamp).toEqual(new Date(1_700_000_000_000));
    });

    it('should round-trip media info', () => {
      const message = store.insert({
        ...inbound('wamid.2', null),
        media: { id: 'media-1', mimeType: 'image/jpeg', description: 'image' },
      });

      expect(message?.hasText).toBe(false);
      expect(store.getById(message?.id ?? -1)?.media).toEqual({
        id: 'media-1',
        mimeType: 'image/jpeg',
        description: 'image',
      });
    });

    it('should return null for an already stored provider id', () => {
      expect(store.insert(inbound('wamid.1'))).not.toBeNull();
      expect(store.insert(inbound('wamid.1', 'again'))).toBeNull();
      expect(store.countByConversation(conversationId)).toBe(1);
    });

    it('should allow several messages without a provider id', () => {
      store.insert({ ...inbound('x'), externalId: null });
      store.insert({ ...inbound('y'), externalId: null });

      expect(store.countByConversation(conversationId)).toBe(2);
    });
  });

  describe('existsInbound', () => {
    it('should only match inbound messages', () => {
      store.insert(inbound('wamid.in'));
      store.insert({ ...inbound('wamid.out'), direction: 'outbound', senderType: 'ai' });

      expect(store.existsInbound('wamid.in')).toBe(true);
      expect(store.existsInbound('wamid.out')).toBe(false);
      expect(store.existsInbound('wamid.none')).toBe(false);
    });
  });

  describe('getByConversation', () => {
    it('should return the latest messages oldest first', () => {
      for (let i = 1; i <= 5; i++) {
        store.insert(inbound(`wamid.${i}`, `message ${i}`));
      }

      expect(store.getByConversation(conversationId, 3).map((m) => m.text)).toEqual([
        'message 3',
        'message 4',
        'message 5',
      ]);
      expect(store.getByConversation(conversationId)).toHaveLength(5);
    });
  });

  describe('updateStatus', () => {
    beforeEach(() => {
      store.insert({ ...inbound('wamid.out'), direction: 'outbound', senderType: 'ai' });
    });

    it('should move the status forward', () => {
      expect(store.updateStatus('wamid.out', 'sent')).toBe('updated');
      expect(store.updateStatus('wamid.out', 'delivered')).toBe('updated');
      expect(store.getByExternalId('wamid.out')?.status).toBe('delivered');
    });

    it('should ignore repeated and stale statuses', () => {
      store.updateStatus('wamid.out', 'read');

      expect(store.updateStatus('wamid.out', 'read')).toBe('unchanged');
      expect(store.updateStatus('wamid.out', 'delivered')).toBe('unchanged');
      expect(store.getByExternalId('wamid.out')?.status).toBe('read');
    });

    it('should record failure details', () => {
      store.updateStatus('wamid.out', 'sent');

      expect(store.updateStatus('wamid.out', 'failed', { code: '131047', message: 'Re-engagement message' })).toBe(
        'updated'
      );
      const message = store.getByExternalId('wamid.out');
      expect(message?.status).toBe('failed');
      expect(message?.errorCode).toBe('131047');
      expect(message?.errorMessage).toBe('Re-engagement message');
    });

    it('should not write error details for other statuses', () => {
      store.updateStatus('wamid.out', 'delivered', { code: '1', message: 'ignored' });

      expect(store.getByExternalId('wamid.out')?.errorCode).toBeNull();
    });

    it('should report unknown messages', () => {
      expect(store.updateStatus('wamid.missing', 'delivered')).toBe('not_found');
    });
  });
});
