/**
 * Tests for the Anthropic Messages adapter.
 */

import { describe, it, expect } from 'vitest';
import { createAnthropicModel, toDecision, toMessages } from '../../src/agent/anthropic-model.js';
import type { DecisionContext } from '../../src/agent/types.js';
import { DEFAULT_CONFIG } from '../../src/config/engine-config.js';
import { CapabilityUnavailableError } from '../../src/utils/errors.js';

describe('toMessages', () => {
  it('maps user, assistant and tool result turns', () => {
    const messages = toMessages([
      { role: 'user', content: 'Any gout?' },
      {
        role: 'assistant',
        text: 'Searching.',
        calls: [{ id: 'call-1', name: 'search_documents', arguments: { query: 'gout' } }],
      },
      {
        role: 'tool_results',
        results: [
          { callId: 'call-1', name: 'search_documents', result: { status: 'ok', data: { documents: [] } }, reused: false },
        ],
      },
    ]);

    expect(messages).toEqual([
      { role: 'user', content: 'Any gout?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Searching.' },
          { type: 'tool_use', id: 'call-1', name: 'search_documents', input: { query: 'gout' } },
        ],
      },
      {
        role: 'user',
        content: [
          {
            type: 'tool_result',
            tool_use_id: 'call-1',
            content: '{"status":"ok","data":{"documents":[]}}',
            is_error: false,
          },
        ],
      },
    ]);
  });

  it('flags error results', () => {
    const [message] = toMessages([
      {
        role: 'tool_results',
        results: [
          {
            callId: 'c',
            name: 'x',
            result: { status: 'error', error: { code: 'UNKNOWN_TOOL', message: 'Unknown tool: x' } },
            reused: false,
          },
        ],
      },
    ]);

    expect(message.content).toEqual([expect.objectContaining({ is_error: true })]);
  });
});

describe('toDecision', () => {
  it('returns tool calls with any accompanying text', () => {
    const decision = toDecision({
      content: [
        { type: 'text', text: 'Let me check.', citations: null },
        { type: 'tool_use', id: 'tu_1', name: 'recall', input: { query: 'dose units' } },
      ],
    });

    expect(decision).toEqual({
      type: 'tool_calls',
      text: 'Let me check.',
      calls: [{ id: 'tu_1', name: 'recall', arguments: { query: 'dose units' } }],
    });
  });

  it('returns the joined text as the final answer when no tool is used', () => {
    const decision = toDecision({
      content: [
        { type: 'text', text: 'Gout is documented in d1.', citations: null },
        { type: 'text', text: 'No flares since 2023.', citations: null },
      ],
    });

    expect(decision).toEqual({ type: 'final_answer', answer: 'Gout is documented in d1.\nNo flares since 2023.' });
  });

  it('replaces non-object tool input with empty arguments', () => {
    const decision = toDecision({
      content: [{ type: 'tool_use', id: 'tu_2', name: 'get_entity_statistics', input: 'oops' }],
    });

    expect(decision).toEqual({
      type: 'tool_calls',
      calls: [{ id: 'tu_2', name: 'get_entity_statistics', arguments: {} }],
    });
  });
});

describe('AnthropicModel', () => {
  const context: DecisionContext = {
    question: 'q',
    memoryContext: '',
    turns: [{ role: 'user', content: 'q' }],
    tools: [],
    iteration: 0,
    remainingMs: 1000,
  };

  it('reports the language model as unavailable without an API key', async () => {
    const model = createAnthropicModel(DEFAULT_CONFIG.llm, {});

    const error = await model.decide(context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CapabilityUnavailableError);
    expect(error).toMatchObject({ capability: 'language_model' });
  });

  it('takes its id from the configured model', () => {
    expect(createAnthropicModel(DEFAULT_CONFIG.llm, {}).id).toBe(DEFAULT_CONFIG.llm.model);
  });
});
