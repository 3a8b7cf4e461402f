/**
 * Tests for list_conversations tool
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ZodError } from 'zod';
import { openDatabase, type SqliteDatabase } from '../../src/storage/database';
import { ConversationStore } from '../../src/storage/conversation-store';
import { listConversations } from '../../src/tools/list-conversations';

describe('listConversations', () => {
  let db: SqliteDatabase;
  let conversations: ConversationStore;
  let clock: number;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    db = openDatabase(':memory:');
    conversations = new ConversationStore(db, () => clock);

    conversations.create('15550000001', 'Ana');
    clock += 60_000;
    const held = conversations.create('15550000002');
    clock += 60_000;
    conversations.create('15550000003', 'Ben');
    clock += 60_000;
    conversations.setInterventionRequired(held.id, true);
  });

  afterEach(() => {
    db.close();
  });

  it('should list the most recently active conversations first', async () => {
    const result = await listConversations({ conversations });

    expect(result.count).toBe(3);
    expect(result.conversations.map((c) => [c.phone, c.state])).toEqual([
      ['15550000002', 'ACTIVE_OPERATOR'],
      ['15550000003', 'ACTIVE_AI'],
      ['15550000001', 'ACTIVE_AI'],
    ]);
    expect(result.conversations[0]).toEqual({
      conversationId: expect.any(Number),
      phone: '15550000002',
      name: null,
      state: 'ACTIVE_OPERATOR',
      lastActivity: '2023-11-14T22:16:20.000Z',
    });
  });

  it('should honor the limit', async () => {
    const result = await listConversations({ conversations }, { limit: 2 });

    expect(result.conversations.map((c) => c.phone)).toEqual(['15550000002', '15550000003']);
  });

  it('should list only operator conversations on request', async () => {
    const result = await listConversations({ conversations }, { operatorOnly: true });

    expect(result).toMatchObject({ count: 1, conversations: [{ phone: '15550000002' }] });
  });

  it('should validate the limit', async () => {
    await expect(listConversations({ conversations }, { limit: 201 })).rejects.toThrow(ZodError);
  });
});
