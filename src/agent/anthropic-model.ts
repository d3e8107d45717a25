/**
 * Language model adapter over the Anthropic Messages API with tool use.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { LlmSettings } from '../config/engine-config.js';
import { CapabilityUnavailableError, errorMessage } from '../utils/errors.js';
import type {
  ConversationTurn,
  DecisionContext,
  LanguageModel,
  ModelDecision,
  ToolCallRequest,
} from './types.js';

/** The subset of the client the adapter calls. */
export type MessagesClient = Pick<Anthropic, 'messages'>;

export interface AnthropicModelOptions {
  model: string;
  maxTokens: number;
  /** Undefined means "not provisioned" */
  apiKey: string | undefined;
  /** Injected client (tests) */
  client?: MessagesClient;
}

const SYSTEM_PROMPT = `You answer clinical questions using retrieval tools over clinical notes, a medical knowledge graph, medical images and stored memories.

- Search before answering; cite document ids for every clinical claim.
- A tool may report capability_unavailable. Say which source was missing and answer from the rest.
- When the user corrects you or states a lasting preference, store it with the remember tool.
- Answer plainly when the evidence is thin rather than guessing.`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert loop turns into Messages API turns.
 */
export function toMessages(turns: ConversationTurn[]): Anthropic.MessageParam[] {
  const messages: Anthropic.MessageParam[] = [];
  for (const turn of turns) {
    switch (turn.role) {
      case 'user':
        messages.push({ role: 'user', content: turn.content });
        break;
      case 'assistant': {
        const content: Anthropic.ContentBlockParam[] = [];
        if (turn.text) content.push({ type: 'text', text: turn.text });
        for (const call of turn.calls) {
          content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        messages.push({ role: 'assistant', content });
        break;
      }
      case 'tool_results':
        messages.push({
          role: 'user',
          content: turn.results.map(
            (r): Anthropic.ToolResultBlockParam => ({
              type: 'tool_result',
              tool_use_id: r.callId,
              content: JSON.stringify(r.result),
              is_error: r.result.status === 'error',
            }),
          ),
        });
        break;
    }
  }
  return messages;
}

/**
 * Read a response: any tool_use block means a tool round, otherwise the
 * text is the answer.
 */
export function toDecision(message: Pick<Anthropic.Message, 'content'>): ModelDecision {
  const texts: string[] = [];
  const calls: ToolCallRequest[] = [];
  for (const block of message.content) {
    if (block.type === 'text') {
      texts.push(block.text);
    } else if (block.type === 'tool_use') {
      calls.push({ id: block.id, name: block.name, arguments: isRecord(block.input) ? block.input : {} });
    }
  }
  const text = texts.join('\n').trim();
  if (calls.length > 0) {
    return text ? { type: 'tool_calls', calls, text } : { type: 'tool_calls', calls };
  }
  return { type: 'final_answer', answer: text };
}

export class AnthropicModel implements LanguageModel {
  readonly id: string;
  private readonly client: MessagesClient | null;

  constructor(private readonly options: AnthropicModelOptions) {
    this.id = options.model;
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 1 });
    } else {
      this.client = null;
    }
  }

  async decide(context: DecisionContext): Promise<ModelDecision> {
    if (!this.client) {
      throw new CapabilityUnavailableError('language_model', 'No Anthropic API key configured');
    }

    const system = context.memoryContext
      ? `${SYSTEM_PROMPT}\n\n${context.memoryContext}`
      : SYSTEM_PROMPT;

    try {
      const response = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          system,
          messages: toMessages(context.turns),
          tools: context.tools.map((t) => ({
            name: t.name,
            description: t.description,
            input_schema: t.inputSchema,
          })),
        },
        { timeout: Math.max(1, Math.floor(context.remainingMs)) },
      );
      return toDecision(response);
    } catch (error) {
      throw new CapabilityUnavailableError(
        'language_model',
        `Model ${this.id} unavailable: ${errorMessage(error)}`,
        error,
      );
    }
  }
}

export function createAnthropicModel(
  settings: LlmSettings,
  env: Record<string, string | undefined> = process.env,
): AnthropicModel {
  return new AnthropicModel({
    model: settings.model,
    maxTokens: settings.maxTokens,
    apiKey: env[settings.apiKeyEnv],
  });
}
