/**
 * Tests for the operator MCP tool dispatch
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ErrorCode, McpError, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { openDatabase, type SqliteDatabase } from '../src/storage/database';
import { ConversationStore } from '../src/storage/conversation-store';
import { MessageStore } from '../src/storage/message-store';
import type { InterventionResult, OperatorMessageResult } from '../src/services/intervention-controller';
import { OPERATOR_TOOLS, callOperatorTool, type OperatorToolDeps } from '../src/server';
import { PHONE } from './helpers';

function resultText(result: CallToolResult): string {
  const item = result.content[0];
  return item?.type === 'text' ? item.text : '';
}

describe('Operator MCP tools', () => {
  let db: SqliteDatabase;
  let deps: OperatorToolDeps;
  let conversationId: number;
  let takeoverResult: InterventionResult;
  let sendResult: OperatorMessageResult | Error;

  beforeEach(() => {
    db = openDatabase(':memory:');
    const conversations = new ConversationStore(db);
    const messages = new MessageStore(db);
    conversationId = conversations.create(PHONE, 'Dana').id;
    takeoverResult = { status: 'takeover_complete', changed: true, conversationId };
    sendResult = { status: 'sent', messageId: 'wamid.op1' };

    deps = {
      conversations,
      messages,
      interventions: {
        takeover: async () => takeoverResult,
        handback: async () => ({ status: 'handback_complete', changed: true, conversationId }),
        sendOperatorMessage: async () => {
          if (sendResult instanceof Error) throw sendResult;
          return sendResult;
        },
      },
    };
  });

  afterEach(() => {
    db.close();
  });

  it('should list every operator tool', () => {
    expect(OPERATOR_TOOLS.map((tool) => tool.name)).toEqual([
      'takeover_conversation',
      'handback_conversation',
      'send_operator_message',
      'get_conversation_thread',
      'list_conversations',
    ]);
  });

  it('should return tool output as JSON text', async () => {
    const result = await callOperatorTool(deps, 'takeover_conversation', { phone: '+15551234567' });

    expect(result.isError).toBeUndefined();
    expect(JSON.parse(resultText(result))).toEqual({ phone: PHONE, conversationId, changed: true });
  });

  it('should dispatch the thread and listing tools', async () => {
    const thread = await callOperatorTool(deps, 'get_conversation_thread', { phone: PHONE, includeContext: true });
    const listing = await callOperatorTool(deps, 'list_conversations');

    expect(JSON.parse(resultText(thread))).toMatchObject({
      phone: PHONE,
      messages: [],
      context: { messageCount: 0 },
    });
    expect(JSON.parse(resultText(listing))).toMatchObject({ count: 1, conversations: [{ phone: PHONE }] });
  });

  it('should dispatch operator messages and handback', async () => {
    const sent = await callOperatorTool(deps, 'send_operator_message', { phone: PHONE, message: 'Hello' });
    const handback = await callOperatorTool(deps, 'handback_conversation', { phone: PHONE });

    expect(JSON.parse(resultText(sent))).toEqual({ phone: PHONE, messageId: 'wamid.op1', status: 'sent' });
    expect(JSON.parse(resultText(handback))).toEqual({ phone: PHONE, conversationId, changed: true });
  });

  it('should report invalid arguments as an error result', async () => {
    const result = await callOperatorTool(deps, 'takeover_conversation', {});

    expect(result.isError).toBe(true);
    expect(resultText(result)).toBe('Error: Invalid arguments: phone is required');
  });

  it('should report tool failures as an error result', async () => {
    takeoverResult = { status: 'not_found' };
    sendResult = new Error('WhatsApp API error: Message failed to send');

    const takeover = await callOperatorTool(deps, 'takeover_conversation', { phone: PHONE });
    const send = await callOperatorTool(deps, 'send_operator_message', { phone: PHONE, message: 'Hi' });

    expect(resultText(takeover)).toBe(`Error: Conversation not found for ${PHONE}`);
    expect(send).toEqual({
      content: [{ type: 'text', text: 'Error: WhatsApp API error: Message failed to send' }],
      isError: true,
    });
  });

  it('should reject unknown tools', async () => {
    const error = await callOperatorTool(deps, 'delete_everything').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(McpError);
    if (error instanceof McpError) {
      expect(error.code).toBe(ErrorCode.MethodNotFound);
    }
  });
});
