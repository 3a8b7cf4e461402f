/**
 * @fileoverview MCP server exposing operator tools
 *
 * Operators can drive conversations from an AI client (for example a
 * desktop assistant) instead of the HTTP API. The server talks MCP over
 * stdio, so nothing but protocol frames may be written to stdout; all
 * logging goes to stderr.
 *
 * @module server
 * @license MIT
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ConversationStore } from './storage/conversation-store.js';
import type { MessageStore } from './storage/message-store.js';
import type { InterventionController } from './services/intervention-controller.js';
import { getConversationThread, getConversationThreadSchema } from './tools/get-conversation-thread.js';
import { handbackConversation, handbackConversationSchema } from './tools/handback-conversation.js';
import { listConversations, listConversationsSchema } from './tools/list-conversations.js';
import { sendOperatorMessage, sendOperatorMessageSchema } from './tools/send-operator-message.js';
import { takeoverConversation, takeoverConversationSchema } from './tools/takeover-conversation.js';
import { errorMessage } from './utils/errors.js';
import { createLogger, type Logger } from './utils/logger.js';
import { formatValidationError } from './utils/validation.js';

/** Services the operator tools call into. An `AppContext` satisfies it. */
export interface OperatorToolDeps {
  interventions: Pick<InterventionController, 'takeover' | 'handback' | 'sendOperatorMessage'>;
  conversations: Pick<ConversationStore, 'findByPhone' | 'listRecent'>;
  messages: Pick<MessageStore, 'getByConversation' | 'countByConversation'>;
}

const phoneProperty = {
  type: 'string',
  description: 'Customer WhatsApp number in international format, with or without "+" (e.g., +15551234567)',
} as const;

/** Tool listing returned to clients. */
export const OPERATOR_TOOLS: Tool[] = [
  {
    name: 'takeover_conversation',
    description:
      'Put a conversation under human operator control. The AI stops answering the customer until the conversation is handed back.',
    inputSchema: {
      type: 'object',
      properties: { phone: phoneProperty },
      required: ['phone'],
    },
  },
  {
    name: 'handback_conversation',
    description: 'Return a conversation to the AI assistant, which answers the next customer message.',
    inputSchema: {
      type: 'object',
      properties: { phone: phoneProperty },
      required: ['phone'],
    },
  },
  {
    name: 'send_operator_message',
    description: 'Send a WhatsApp text message to a customer on behalf of a human operator.',
    inputSchema: {
      type: 'object',
      properties: {
        phone: phoneProperty,
        message: {
          type: 'string',
          description: 'Message text (1-4096 characters)',
        },
        senderId: {
          type: 'string',
          description: 'Optional: operator identifier stored with the message (default: "mcp")',
        },
      },
      required: ['phone', 'message'],
    },
  },
  {
    name: 'get_conversation_thread',
    description: 'Retrieve the latest messages of a conversation (customer, AI and operator), oldest first.',
    inputSchema: {
      type: 'object',
      properties: {
        phone: phoneProperty,
        limit: {
          type: 'number',
          description: 'Maximum number of messages to return (1-500, default: 50)',
          default: 50,
        },
        includeContext: {
          type: 'boolean',
          description: 'Include a summary with state, last activity and total message count (default: false)',
          default: false,
        },
      },
      required: ['phone'],
    },
  },
  {
    name: 'list_conversations',
    description: 'List the most recently active conversations and who is handling each.',
    inputSchema: {
      type: 'object',
      properties: {
        limit: {
          type: 'number',
          description: 'Maximum number of conversations (1-200, default: 20)',
          default: 20,
        },
        operatorOnly: {
          type: 'boolean',
          description: 'Only conversations under operator control (default: false)',
          default: false,
        },
      },
    },
  },
];

function textResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/**
 * Run one tool call. Unknown tools raise `McpError`; every other failure
 * is reported to the client as an error result.
 *
 * @example
 * await callOperatorTool(context, 'takeover_conversation', { phone: '+15551234567' });
 * // => { content: [{ type: 'text', text: '{\n  "phone": "15551234567", ...' }] }
 */
export async function callOperatorTool(
  deps: OperatorToolDeps,
  name: string,
  args: Record<string, unknown> = {}
): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'takeover_conversation':
        return textResult(await takeoverConversation(deps, takeoverConversationSchema.parse(args)));

      case 'handback_conversation':
        return textResult(await handbackConversation(deps, handbackConversationSchema.parse(args)));

      case 'send_operator_message':
        return textResult(await sendOperatorMessage(deps, sendOperatorMessageSchema.parse(args)));

      case 'get_conversation_thread':
        return textResult(await getConversationThread(deps, getConversationThreadSchema.parse(args)));

      case 'list_conversations':
        return textResult(await listConversations(deps, listConversationsSchema.parse(args)));

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }

    const message =
      error instanceof z.ZodError ? `Invalid arguments: ${formatValidationError(error)}` : errorMessage(error);
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${message}`,
        },
      ],
      isError: true,
    };
  }
}

/**
 * OperatorMcpServer exposes the operator tools over stdio.
 *
 * @example
 * const context = new AppContext(loadConfig());
 * await new OperatorMcpServer(context).start();
 *
 * @example
 * // MCP client configuration
 * {
 *   "mcpServers": {
 *     "wa-relay": {
 *       "command": "node",
 *       "args": ["/path/to/dist/operator-mcp.js"],
 *       "env": {
 *         "WHATSAPP_ACCESS_TOKEN": "your-token",
 *         "WHATSAPP_PHONE_NUMBER_ID": "123456789012345",
 *         "VERIFY_TOKEN": "your-verify-token",
 *         "AI_API_KEY": "your-key",
 *         "DATABASE_PATH": "/path/to/data/wa-relay.db"
 *       }
 *     }
 *   }
 * }
 */
export class OperatorMcpServer {
  private readonly server: Server;
  private readonly logger: Logger;

  constructor(private readonly deps: OperatorToolDeps, logger?: Logger) {
    this.logger = logger ?? createLogger('mcp');
    this.server = new Server(
      {
        name: 'wa-relay-operator',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: OPERATOR_TOOLS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      this.logger.debug(`Tool call: ${request.params.name}`);
      return callOperatorTool(this.deps, request.params.name, request.params.arguments);
    });
  }

  /**
   * Connect the stdio transport.
   */
  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('Operator MCP server running on stdio');
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
