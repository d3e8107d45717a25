/**
 * Agent exports and the default wiring.
 */

import { createToolCatalog } from '../mcp/tools.js';
import { autoRecall } from '../retrieval/memory.js';
import type { RetrievalServices } from '../retrieval/services.js';
import { AgentLoop } from './agent-loop.js';
import { createAnthropicModel } from './anthropic-model.js';
import type { LanguageModel } from './types.js';

export { AgentLoop, bestEffortAnswer, stableStringify, summarizeResult } from './agent-loop.js';
export type { AgentLoopOptions } from './agent-loop.js';
export { AnthropicModel, createAnthropicModel, toDecision, toMessages } from './anthropic-model.js';
export type * from './types.js';

/**
 * An agent over the full tool catalog, recalling memories for each
 * question. The model defaults to the configured Anthropic model.
 */
export function createAgent(
  services: RetrievalServices,
  model: LanguageModel = createAnthropicModel(services.config.llm),
): AgentLoop {
  return new AgentLoop({
    model,
    catalog: createToolCatalog(services),
    settings: services.config.agent,
    recallMemories: (question) => autoRecall(services, question),
  });
}
