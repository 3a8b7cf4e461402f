/**
 * Tests for ConversationStore
 * Tests conversation creation, lookup, the intervention flag and listing
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { openDatabase, type SqliteDatabase } from '../../src/storage/database';
import { ConversationStore } from '../../src/storage/conversation-store';

describe('ConversationStore', () => {
  let db: SqliteDatabase;
  let store: ConversationStore;
  let clock: number;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    db = openDatabase(':memory:');
    store = new ConversationStore(db, () => clock);
  });

  afterEach(() => {
    db.close();
  });

  describe('create', () => {
    it('should create an AI-handled conversation', () => {
      const conversation = store.create('15551234567', 'Dana');

      expect(conversation.id).toBeGreaterThan(0);
      expect(conversation.phone).toBe('15551234567');
      expect(conversation.name).toBe('Dana');
      expect(conversation.humanInterventionRequired).toBe(false);
      expect(conversation.lastMessageId).toBeNull();
      expect(conversation.createdAt).toEqual(new Date(clock));
    });

    it('should reject a second conversation for the same phone', () => {
      store.create('15551234567');
      expect(() => store.create('15551234567')).toThrow();
    });
  });

  describe('findOrCreate', () => {
    it('should create on first contact', () => {
      const { conversation, created } = store.findOrCreate('15551234567', 'Dana');

      expect(created).toBe(true);
      expect(store.findByPhone('15551234567')?.id).toBe(conversation.id);
    });

    it('should return the existing conversation afterwards', () => {
      const first = store.findOrCreate('15551234567', 'Dana');
      const second = store.findOrCreate('15551234567', 'Dana');

      expect(second.created).toBe(false);
      expect(second.conversation.id).toBe(first.conversation.id);
    });

    it('should update a changed profile name', () => {
      store.findOrCreate('15551234567', 'Dana');
      const { conversation } = store.findOrCreate('15551234567', 'Dana R.');

      expect(conversation.name).toBe('Dana R.');
      expect(store.findByPhone('15551234567')?.name).toBe('Dana R.');
    });

    it('should keep the stored name when none is reported', () => {
      store.findOrCreate('15551234567', 'Dana');
      const { conversation } = store.findOrCreate('15551234567', null);

      expect(conversation.name).toBe('Dana');
    });
  });

  describe('setInterventionRequired', () => {
    it('should report a change only when the value changes', () => {
      const { id } = store.create('15551234567');

      expect(store.setInterventionRequired(id, true)).toBe(true);
      expect(store.setInterventionRequired(id, true)).toBe(false);
      expect(store.getById(id)?.humanInterventionRequired).toBe(true);

      expect(store.setInterventionRequired(id, false)).toBe(true);
      expect(store.setInterventionRequired(id, false)).toBe(false);
      expect(store.getById(id)?.humanInterventionRequired).toBe(false);
    });

    it('should report no change for an unknown conversation', () => {
      expect(store.setInterventionRequired(999, true)).toBe(false);
    });

    it('should touch updated_at', () => {
      const { id } = store.create('15551234567');
      clock += 5_000;
      store.setInterventionRequired(id, true);

      expect(store.getById(id)?.updatedAt).toEqual(new Date(clock));
    });
  });

  describe('listRecent', () => {
    it('should list the most recently updated first', () => {
      const a = store.create('15550000001');
      clock += 1_000;
      const b = store.create('15550000002');
      clock += 1_000;
      store.setLastMessage(a.id, 42);

      expect(store.listRecent().map((c) => c.id)).toEqual([a.id, b.id]);
      expect(store.listRecent(1).map((c) => c.id)).toEqual([a.id]);
    });

    it('should restrict to operator conversations on request', () => {
      store.create('15550000001');
      const held = store.create('15550000002');
      store.setInterventionRequired(held.id, true);

      expect(store.listRecent(10, { operatorOnly: true }).map((c) => c.phone)).toEqual(['15550000002']);
    });
  });
});
