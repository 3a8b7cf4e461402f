/**
 * @fileoverview AI responder backed by an OpenAI-compatible chat API
 *
 * The router only depends on the {@link AiResponder} interface. The
 * bundled implementation keeps per-thread memory in the AI session store,
 * stays silent while an operator is active on the thread, and exposes a
 * `request_human_intervention` tool the model calls when it cannot help.
 * A handoff is only reported; the caller's durable takeover updates the
 * session's operator flag.
 *
 * @module services/ai-responder
 * @license MIT
 */

import nodeFetch, { type Response } from 'node-fetch';
import { z } from 'zod';
import type { SessionMessage, SessionStore } from '../storage/session-store.js';
import { AiResponderError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { contentToHistoryText, type AiContent } from './content-formatter.js';
import type { FetchLike } from './whatsapp-client.js';

export interface AiUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface AiReply {
  /** Reply for the customer; null when there is nothing to send. */
  text: string | null;
  /** The model asked for a human to take over the conversation. */
  requestedIntervention: boolean;
  usage: AiUsage | null;
}

export interface AiResponder {
  respond(threadId: string, content: AiContent): Promise<AiReply>;
}

export const INTERVENTION_TOOL_NAME = 'request_human_intervention';

const INTERVENTION_TOOL = {
  type: 'function',
  function: {
    name: INTERVENTION_TOOL_NAME,
    description:
      'Hand the conversation to a human operator when you cannot answer the customer, ' +
      'the customer asks for a person, or the request needs a human decision.',
    parameters: {
      type: 'object',
      properties: {
        reason: { type: 'string', description: 'Short reason for the handoff' },
      },
      required: [],
    },
  },
} as const;

const HANDOFF_TOOL_RESULT = 'A human operator has been notified and will continue this conversation.';

export const DEFAULT_HANDOFF_REPLY = 'I am connecting you with a member of our team. They will reply here shortly.';

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({ name: z.string(), arguments: z.string() }),
});

type ToolCall = z.infer<typeof toolCallSchema>;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(toolCallSchema).optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

type ChatMessage =
  | { role: 'system' | 'user'; content: AiContent }
  | { role: 'assistant'; content: string | null; tool_calls?: ToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export interface ChatCompletionsResponderOptions {
  apiKey: string;
  /** API root such as `https://api.openai.com/v1`. */
  baseUrl: string;
  model: string;
  systemPrompt: string;
  sessions: Pick<SessionStore, 'get' | 'history' | 'appendMessages'>;
  historyLimit?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * ChatCompletionsResponder answers one turn per call.
 *
 * @example
 * const responder = new ChatCompletionsResponder({
 *   apiKey: 'test-key',
 *   baseUrl: 'https://api.openai.com/v1',
 *   model: 'gpt-4o-mini',
 *   systemPrompt: 'You are a helpful sales assistant.',
 *   sessions,
 * });
 * const reply = await responder.respond('15551234567', 'Do you ship abroad?');
 */
export class ChatCompletionsResponder implements AiResponder {
  private readonly fetch: FetchLike;
  private readonly historyLimit: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: ChatCompletionsResponderOptions) {
    this.fetch = options.fetch ?? nodeFetch;
    this.historyLimit = options.historyLimit ?? 30;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.logger = options.logger ?? createLogger('ai');
  }

  /**
   * @throws {AiResponderError} If the API call fails or returns nothing usable
   */
  async respond(threadId: string, content: AiContent): Promise<AiReply> {
    const session = await this.options.sessions.get(threadId);
    if (session?.operatorActive) {
      this.logger.info(`Operator active on ${threadId}; not answering`);
      return { text: null, requestedIntervention: false, usage: null };
    }

    const history = await this.options.sessions.history(threadId, this.historyLimit);
    const messages: ChatMessage[] = [
      { role: 'system', content: this.options.systemPrompt },
      ...history.map(toChatMessage),
      { role: 'user', content },
    ];

    const first = await this.complete(messages);
    const choice = first.choices[0].message;
    const handoff = choice.tool_calls?.find((call) => call.function.name === INTERVENTION_TOOL_NAME);

    let text = choice.content ?? null;
    const usage = toUsage(first.usage);

    if (handoff) {
      this.logger.info(`Model requested human intervention for ${threadId}`);
      text = await this.handoffReply(messages, choice.content ?? null, handoff);
    }

    const turn: SessionMessage[] = [{ role: 'user', content: contentToHistoryText(content) }];
    if (text) {
      turn.push({ role: 'assistant', content: text });
    }
    await this.options.sessions.appendMessages(threadId, turn);

    return { text, requestedIntervention: handoff !== undefined, usage };
  }

  /**
   * Ask the model for the customer-facing handoff notice after the tool
   * call; falls back to a fixed notice when that second call fails.
   */
  private async handoffReply(messages: ChatMessage[], content: string | null, call: ToolCall): Promise<string> {
    try {
      const followUp = await this.complete([
        ...messages,
        { role: 'assistant', content, tool_calls: [call] },
        { role: 'tool', tool_call_id: call.id, content: HANDOFF_TOOL_RESULT },
      ]);
      return followUp.choices[0].message.content || DEFAULT_HANDOFF_REPLY;
    } catch (error) {
      this.logger.warn(`Handoff reply generation failed: ${errorMessage(error)}`);
      return DEFAULT_HANDOFF_REPLY;
    }
  }

  private async complete(messages: ChatMessage[]): Promise<z.infer<typeof completionSchema>> {
    let response: Response;
    try {
      response = await this.fetch(`${this.options.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          messages,
          tools: [INTERVENTION_TOOL],
          tool_choice: 'auto',
        }),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new AiResponderError(`AI request failed: ${errorMessage(error)}`);
    }

    const body = await response.text();
    if (!response.ok) {
      throw new AiResponderError(`AI API returned ${response.status}: ${body.slice(0, 200)}`, response.status);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new AiResponderError('AI API returned invalid JSON', response.status);
    }
    const parsed = completionSchema.safeParse(data);
    if (!parsed.success) {
      throw new AiResponderError('AI API response has no choices', response.status);
    }
    return parsed.data;
  }
}

function toChatMessage(message: SessionMessage): ChatMessage {
  return message.role === 'assistant'
    ? { role: 'assistant', content: message.content }
    : { role: message.role, content: message.content };
}

function toUsage(usage: z.infer<typeof completionSchema>['usage']): AiUsage | null {
  if (!usage) return null;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}
