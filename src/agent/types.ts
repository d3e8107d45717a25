/**
 * Types shared by the agent loop and language model adapters.
 */

import type { ToolDefinition, ToolResult, ToolStatus } from '../mcp/tools.js';
import type { RecalledMemory } from '../retrieval/memory.js';

export interface ToolCallRequest {
  /** Correlates a call with its result; assigned by the loop when absent */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * What the model wants next: run tools, or answer.
 */
export type ModelDecision =
  | { type: 'tool_calls'; calls: ToolCallRequest[]; text?: string }
  | { type: 'final_answer'; answer: string };

export type ToolDescriptor = Pick<ToolDefinition, 'name' | 'description' | 'inputSchema'>;

export interface ToolResultEntry {
  callId: string;
  name: string;
  result: ToolResult;
  reused: boolean;
}

export type ConversationTurn =
  | { role: 'user'; content: string }
  | { role: 'assistant'; text?: string; calls: ToolCallRequest[] }
  | { role: 'tool_results'; results: ToolResultEntry[] };

export interface DecisionContext {
  question: string;
  /** Formatted recalled memories, or '' */
  memoryContext: string;
  turns: ConversationTurn[];
  tools: ToolDescriptor[];
  /** Tool rounds completed so far */
  iteration: number;
  /** Wall-clock budget left for this question */
  remainingMs: number;
}

export interface LanguageModel {
  readonly id: string;
  decide(context: DecisionContext): Promise<ModelDecision>;
}

export type AgentState =
  | 'AwaitingModelDecision'
  | 'ToolExecuting'
  | 'Done'
  | 'IterationLimitExceeded'
  | 'TimeBudgetExceeded'
  | 'ModelUnavailable';

export type TerminalState = Extract<
  AgentState,
  'Done' | 'IterationLimitExceeded' | 'TimeBudgetExceeded' | 'ModelUnavailable'
>;

export interface ToolExecution {
  /** 1-based tool round */
  iteration: number;
  tool: string;
  args: Record<string, unknown>;
  status: ToolStatus;
  durationMs: number;
  /** Served from an identical earlier call in this loop */
  reused: boolean;
  summary: string;
}

export interface AgentResponse {
  answer: string;
  state: TerminalState;
  /** True unless the model gave a final answer */
  partial: boolean;
  iterationLimitExceeded: boolean;
  /** Tool rounds executed */
  iterations: number;
  toolExecutions: ToolExecution[];
  recalledMemories: RecalledMemory[];
  /** Tools that returned ok, in first-use order */
  sourcesUsed: string[];
  /** Tools that reported capability_unavailable, in first-report order */
  sourcesUnavailable: string[];
  durationMs: number;
}
