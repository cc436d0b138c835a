// ═══════════════════════════════════════════════════════════════
// Warden :: Core Orchestrator
// Drives one turn end to end:
//   received → awaiting_worker → (tool_requested → awaiting_agent
//   → awaiting_worker)* → finalized → sealed
// ═══════════════════════════════════════════════════════════════

import { EventEmitter } from 'eventemitter3';
import { v7 as uuidv7 } from 'uuid';
import type {
  AgentFailure, AgentResult, ApiKey, ConversationMessage, LoggerHandle,
  ToolCallRequest, TurnOutcome, TurnRecord, TurnState, WorkerModel, WorkerResponse,
} from './types.js';
import {
  PolicyError, UnknownAgentError, UnknownToolError, UpstreamError, errorMessage,
} from './errors.js';
import type { AgentGateway } from '../agents/gateway.js';
import type { PolicyStore } from '../policy/policy-store.js';
import type { TurnHandle, TurnRecorder } from '../protocols/turn-recorder.js';
import type { ScoringDispatcher } from '../watchdog/dispatcher.js';

// ── Event Bus ───────────────────────────────────────────────

export interface TurnSummary {
  correlationId: string;
  keyId: string;
  toolCalls: number;
  outcome: TurnOutcome;
  toolLoopExceeded: boolean;
  durationMs: number;
}

type OrchestratorEvents = {
  'turn:state': (correlationId: string, state: TurnState) => void;
  'turn:finalized': (summary: TurnSummary) => void;
  'tool:invoked': (correlationId: string, toolName: string) => void;
  'tool:result': (correlationId: string, toolName: string, result: AgentResult) => void;
  'policy:denied': (correlationId: string, keyId: string, toolName: string) => void;
};

// ── Turn I/O ────────────────────────────────────────────────

export interface TurnInput {
  prompt: string;
  apiKey: ApiKey;
}

export interface TurnReply {
  correlationId: string;
  answer: string;
  toolLoopExceeded: boolean;
  toolCalls: number;
}

export interface OrchestratorOptions {
  systemPrompt: string;
  maxToolRoundTrips: number;
  /** Correlation id source; UUIDv7 (timestamp + random) unless overridden. */
  newCorrelationId?: () => string;
}

export interface OrchestratorDeps {
  worker: WorkerModel;
  gateway: Pick<AgentGateway, 'invoke'>;
  recorder: TurnRecorder;
  scoring: Pick<ScoringDispatcher, 'submit'>;
  policy: Pick<PolicyStore, 'toolsForKey'>;
  logger: LoggerHandle;
}

export function toolLoopNote(max: number): string {
  return `[ToolLoopExceeded] Stopped after ${max} tool calls; this answer may be incomplete.`;
}

/** Text handed back to the worker model as the tool's result. */
export function describeToolResult(result: AgentResult): string {
  if (!result.ok) return `tool call failed: ${result.message}`;

  const lines = [result.summary];
  if (result.structuredSnippets.length > 0) {
    lines.push('', 'Snippets:', ...result.structuredSnippets.map(s => `- ${s}`));
  }
  if (result.sources.length > 0) {
    lines.push('', 'Sources:', ...result.sources.map(s => `- ${s.title || s.url} <${s.url}>`));
  }
  if (result.partial) {
    lines.push('', '[partial result: truncated to the agent size limit]');
  }
  if (result.anomalies.length > 0) {
    lines.push('', `[${result.anomalies.length} source(s) removed: outside the agent allowlist]`);
  }
  return lines.join('\n');
}

// ── Orchestrator ────────────────────────────────────────────

export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private deps: OrchestratorDeps;
  private options: Required<OrchestratorOptions>;
  private logger: LoggerHandle;
  private inFlight = 0;
  private completed = 0;
  private failed = 0;

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
    super();
    this.deps = deps;
    this.logger = deps.logger;
    this.options = { newCorrelationId: () => uuidv7(), ...options };
    this.logger.info(`Orchestrator initialized (max ${options.maxToolRoundTrips} tool round-trips per turn)`);
  }

  async handleTurn(input: TurnInput): Promise<TurnReply> {
    const start = Date.now();
    const { apiKey } = input;
    const { recorder, scoring } = this.deps;

    // ── received ──
    const correlationId = this.options.newCorrelationId();
    const handle = recorder.begin(correlationId, input.prompt);
    this.transition(correlationId, 'received');
    this.inFlight++;
    this.logger.info(`Turn received: ${correlationId}`, { correlationId, keyId: apiKey.keyId });

    let answer: string;
    let toolLoopExceeded = false;
    try {
      ({ answer, toolLoopExceeded } = await this.runLoop(correlationId, handle, input));
    } catch (err) {
      // Sealed and scored even on failure; agent side effects may already have happened.
      // Only worker failures are UpstreamErrors; anything else is an integration bug and propagates as is.
      const upstream = err instanceof UpstreamError;
      const outcome: TurnOutcome = upstream ? 'upstream_error' : 'internal_error';
      const sealed = recorder.seal(handle, `${upstream ? 'upstream' : 'internal'} error: ${errorMessage(err)}`, { outcome });
      this.finish(sealed, apiKey, start);
      this.failed++;
      scoring.submit(sealed);
      this.logger.error(`Turn ${correlationId} failed: ${errorMessage(err)}`, { correlationId, outcome });
      throw err;
    }

    // ── finalized ──
    this.transition(correlationId, 'finalized');
    const record = recorder.seal(handle, answer, { toolLoopExceeded });

    // ── sealed ──
    this.finish(record, apiKey, start);
    this.completed++;
    scoring.submit(record);

    return {
      correlationId,
      answer,
      toolLoopExceeded,
      toolCalls: record.toolCalls.length,
    };
  }

  getState(): { inFlight: number; completed: number; failed: number; maxToolRoundTrips: number } {
    return {
      inFlight: this.inFlight,
      completed: this.completed,
      failed: this.failed,
      maxToolRoundTrips: this.options.maxToolRoundTrips,
    };
  }

  // ── State Machine ───────────────────────────────────────

  private async runLoop(
    correlationId: string,
    handle: TurnHandle,
    input: TurnInput,
  ): Promise<{ answer: string; toolLoopExceeded: boolean }> {
    const { recorder } = this.deps;
    const max = this.options.maxToolRoundTrips;
    const availableTools = this.deps.policy.toolsForKey(input.apiKey);
    const history: ConversationMessage[] = [{ role: 'user', content: input.prompt }];
    let roundTrips = 0;

    for (;;) {
      this.transition(correlationId, 'awaiting_worker');
      const response = await this.callWorker(correlationId, history, availableTools);

      if (response.type === 'answer') {
        return { answer: response.text, toolLoopExceeded: false };
      }

      if (roundTrips >= max) {
        this.logger.warn(`Tool loop bound reached for ${correlationId} (${max}); finalizing early`, {
          correlationId, requestedTool: response.toolName,
        });
        const note = toolLoopNote(max);
        return { answer: response.text ? `${response.text}\n\n${note}` : note, toolLoopExceeded: true };
      }
      roundTrips++;

      // ── tool_requested ──
      this.transition(correlationId, 'tool_requested');
      const request: ToolCallRequest = Object.freeze({
        toolName: response.toolName,
        arguments: Object.freeze(structuredClone(response.arguments)),
        correlationId,
        callId: response.callId,
      });

      // ── awaiting_agent ──
      this.transition(correlationId, 'awaiting_agent');
      const result = await this.dispatchTool(request, input.apiKey);
      recorder.recordToolCall(handle, request, result);
      this.emit('tool:result', correlationId, request.toolName, result);

      history.push(
        { role: 'tool_call', callId: request.callId, toolName: request.toolName, arguments: request.arguments, text: response.text },
        { role: 'tool_result', callId: request.callId, content: describeToolResult(result), isError: !result.ok },
      );
    }
  }

  private async callWorker(
    correlationId: string,
    history: readonly ConversationMessage[],
    availableTools: ReturnType<PolicyStore['toolsForKey']>,
  ): Promise<WorkerResponse> {
    try {
      return await this.deps.worker.complete({
        correlationId,
        systemPrompt: this.options.systemPrompt,
        conversationHistory: [...history],
        availableTools,
      });
    } catch (err) {
      throw new UpstreamError(correlationId, `Worker model call failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Gateway rejections become failed tool results; the turn carries on. */
  private async dispatchTool(request: ToolCallRequest, apiKey: ApiKey): Promise<AgentResult> {
    const { correlationId, toolName } = request;
    this.emit('tool:invoked', correlationId, toolName);
    try {
      return await this.deps.gateway.invoke(request, apiKey);
    } catch (err) {
      if (err instanceof PolicyError) {
        this.emit('policy:denied', correlationId, apiKey.keyId, toolName);
        return rejected('policy', 'not authorized');
      }
      if (err instanceof UnknownToolError || err instanceof UnknownAgentError) {
        return rejected('unknown_tool', `unknown tool: ${toolName}`);
      }
      throw err;
    }
  }

  private transition(correlationId: string, state: TurnState): void {
    this.logger.debug(`Turn ${correlationId} -> ${state}`);
    this.emit('turn:state', correlationId, state);
  }

  private finish(record: TurnRecord, apiKey: ApiKey, start: number): void {
    this.inFlight--;
    this.transition(record.correlationId, 'sealed');
    const summary: TurnSummary = {
      correlationId: record.correlationId,
      keyId: apiKey.keyId,
      toolCalls: record.toolCalls.length,
      outcome: record.outcome,
      toolLoopExceeded: record.toolLoopExceeded,
      durationMs: Date.now() - start,
    };
    this.emit('turn:finalized', summary);
    this.logger.info(`Turn sealed: ${record.correlationId} in ${summary.durationMs}ms`, { ...summary });
  }
}

function rejected(kind: AgentFailure['kind'], message: string): AgentFailure {
  return { ok: false, kind, message };
}
