/**
 * Agent loop: alternate model decisions and tool rounds until the model
 * answers or a bound is hit.
 *
 * ```
 * AwaitingModelDecision → ToolExecuting → AwaitingModelDecision → …
 *   → Done | IterationLimitExceeded | TimeBudgetExceeded | ModelUnavailable
 * ```
 *
 * The iteration cap counts tool rounds. Once the cap is reached the loop
 * stops without asking the model again. The wall-clock budget is checked
 * before every decision and every tool round. Whatever stops the loop, the
 * caller gets an answer: the model's latest text, or a summary of what the
 * tools returned.
 *
 * Tool results are memoised per loop by (tool, arguments). Nothing is shared
 * between loops.
 */

import type { AgentSettings } from '../config/engine-config.js';
import type { ToolCatalog, ToolResult } from '../mcp/tools.js';
import { toToolResult } from '../mcp/tools.js';
import type { RecalledMemory } from '../retrieval/memory.js';
import { formatMemoryContext } from '../retrieval/memory.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import type {
  AgentResponse,
  AgentState,
  ConversationTurn,
  LanguageModel,
  ModelDecision,
  TerminalState,
  ToolCallRequest,
  ToolExecution,
  ToolResultEntry,
} from './types.js';

const log = createLogger('agent');

export interface AgentLoopOptions {
  model: LanguageModel;
  catalog: ToolCatalog;
  settings: AgentSettings;
  /** Memory lookup for a new question; omitted means no auto-recall */
  recallMemories?: (question: string) => Promise<RecalledMemory[]>;
  /** Clock in ms (tests) */
  now?: () => number;
}

/**
 * JSON with object keys sorted, so argument order does not affect identity.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

const COUNTED_FIELDS = ['documents', 'entities', 'connected', 'images', 'results', 'memories'] as const;

/**
 * One-line description of a tool result.
 */
export function summarizeResult(result: ToolResult): string {
  switch (result.status) {
    case 'capability_unavailable':
      return `unavailable: ${result.message}`;
    case 'error':
      return `error ${result.error.code}: ${result.error.message}`;
    case 'ok': {
      const data = result.data;
      if (typeof data === 'object' && data !== null) {
        const fields = new Map<string, unknown>(Object.entries(data));
        for (const field of COUNTED_FIELDS) {
          const value = fields.get(field);
          if (Array.isArray(value)) return `${value.length} ${field}`;
        }
      }
      return 'ok';
    }
  }
}

export class AgentLoop {
  private readonly now: () => number;

  constructor(private readonly options: AgentLoopOptions) {
    this.now = options.now ?? Date.now;
  }

  private async recallWithinBudget(
    recall: (question: string) => Promise<RecalledMemory[]>,
    question: string,
  ): Promise<RecalledMemory[]> {
    try {
      return await withTimeout(recall(question), this.options.settings.timeBudgetMs, 'auto-recall');
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      log.warn('Auto-recall ran past the time budget', { error: error.message });
      return [];
    }
  }

  async run(question: string): Promise<AgentResponse> {
    const { model, catalog, settings } = this.options;
    const startedAt = this.now();
    const elapsed = () => this.now() - startedAt;

    const recalledMemories =
      settings.autoRecall && this.options.recallMemories
        ? await this.recallWithinBudget(this.options.recallMemories, question)
        : [];
    const memoryContext = formatMemoryContext(recalledMemories);

    const tools = catalog.tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
    const turns: ConversationTurn[] = [{ role: 'user', content: question }];
    const executions: ToolExecution[] = [];
    const history = new Map<string, Promise<ToolResult>>();

    let state: AgentState = 'AwaitingModelDecision';
    let iterations = 0;
    let latestText: string | undefined;
    let finalAnswer: string | undefined;
    let pending: ToolCallRequest[] = [];

    while (state === 'AwaitingModelDecision' || state === 'ToolExecuting') {
      const remainingMs = settings.timeBudgetMs - elapsed();
      if (remainingMs <= 0) {
        state = 'TimeBudgetExceeded';
        break;
      }

      if (state === 'AwaitingModelDecision') {
        let decision: ModelDecision;
        try {
          decision = await withTimeout(
            model.decide({ question, memoryContext, turns, tools, iteration: iterations, remainingMs }),
            remainingMs,
            'model decision',
          );
        } catch (error) {
          if (error instanceof TimeoutError) {
            state = 'TimeBudgetExceeded';
          } else {
            log.warn('Model unavailable', { model: model.id, error: errorMessage(error) });
            state = 'ModelUnavailable';
          }
          break;
        }

        if (decision.type === 'final_answer') {
          finalAnswer = decision.answer;
          state = 'Done';
          break;
        }

        if (decision.text) latestText = decision.text;
        if (decision.calls.length === 0) {
          finalAnswer = decision.text ?? '';
          state = 'Done';
          break;
        }

        pending = decision.calls.map((call, i) => ({
          ...call,
          id: call.id || `call-${iterations + 1}-${i + 1}`,
        }));
        turns.push({ role: 'assistant', text: decision.text, calls: pending });
        state = 'ToolExecuting';
        continue;
      }

      iterations++;
      const results = await this.executeRound(pending, iterations, history, remainingMs, executions);
      turns.push({ role: 'tool_results', results });
      pending = [];

      state = iterations >= settings.maxIterations ? 'IterationLimitExceeded' : 'AwaitingModelDecision';
    }

    const terminal = toTerminal(state);
    const answer =
      terminal === 'Done' && finalAnswer !== undefined
        ? finalAnswer
        : bestEffortAnswer(terminal, latestText, executions);

    log.info('Agent finished', { state: terminal, iterations, tools: executions.length });

    return {
      answer,
      state: terminal,
      partial: terminal !== 'Done',
      iterationLimitExceeded: terminal === 'IterationLimitExceeded',
      iterations,
      toolExecutions: executions,
      recalledMemories,
      sourcesUsed: distinct(executions.filter((e) => e.status === 'ok').map((e) => e.tool)),
      sourcesUnavailable: distinct(
        executions.filter((e) => e.status === 'capability_unavailable').map((e) => e.tool),
      ),
      durationMs: elapsed(),
    };
  }

  /**
   * Run one round of calls concurrently; results come back in request order.
   */
  private async executeRound(
    calls: ToolCallRequest[],
    iteration: number,
    history: Map<string, Promise<ToolResult>>,
    remainingMs: number,
    executions: ToolExecution[],
  ): Promise<ToolResultEntry[]> {
    const timeoutMs = Math.min(this.options.settings.toolTimeoutMs, remainingMs);

    const runs = calls.map(async (call) => {
      const key = `${call.name}:${stableStringify(call.arguments)}`;
      const earlier = history.get(key);
      const started = this.now();
      const reused = earlier !== undefined;
      const promise = earlier ?? this.callTool(call, timeoutMs);
      if (!earlier) history.set(key, promise);
      const result = await promise;
      return { call, result, reused, durationMs: reused ? 0 : this.now() - started };
    });

    const settled = await Promise.all(runs);
    return settled.map(({ call, result, reused, durationMs }) => {
      executions.push({
        iteration,
        tool: call.name,
        args: call.arguments,
        status: result.status,
        durationMs,
        reused,
        summary: summarizeResult(result),
      });
      return { callId: call.id, name: call.name, result, reused };
    });
  }

  private async callTool(call: ToolCallRequest, timeoutMs: number): Promise<ToolResult> {
    try {
      return await withTimeout(this.options.catalog.call(call.name, call.arguments), timeoutMs, call.name);
    } catch (error) {
      if (error instanceof TimeoutError) {
        log.warn('Tool timed out', { tool: call.name, timeoutMs });
        return { status: 'capability_unavailable', message: error.message };
      }
      return toToolResult(error);
    }
  }
}

function toTerminal(state: AgentState): TerminalState {
  switch (state) {
    case 'Done':
    case 'IterationLimitExceeded':
    case 'TimeBudgetExceeded':
    case 'ModelUnavailable':
      return state;
    default:
      return 'ModelUnavailable';
  }
}

function distinct(values: string[]): string[] {
  return [...new Set(values)];
}

const STOP_REASONS: Record<Exclude<TerminalState, 'Done'>, string> = {
  IterationLimitExceeded: 'the tool iteration limit was reached',
  TimeBudgetExceeded: 'the time budget ran out',
  ModelUnavailable: 'the language model is unavailable',
};

/**
 * The model's latest text if it wrote any, else a digest of tool outcomes.
 */
export function bestEffortAnswer(
  state: TerminalState,
  latestText: string | undefined,
  executions: ToolExecution[],
): string {
  if (latestText) return latestText;

  const reason = state === 'Done' ? 'no answer was produced' : STOP_REASONS[state];
  const lines = [`Partial result: ${reason}.`];
  const fresh = executions.filter((e) => !e.reused);
  if (fresh.length === 0) {
    lines.push('No tools were run.');
  } else {
    lines.push('Tool outcomes:');
    for (const e of fresh) {
      lines.push(`- ${e.tool} (${e.status}): ${e.summary}`);
    }
  }
  return lines.join('\n');
}
