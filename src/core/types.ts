// ═══════════════════════════════════════════════════════════════
// Warden :: Core Type Definitions
// Turns, tool calls, agent endpoints, verdicts and keys
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';

// ── Logger ──────────────────────────────────────────────────

export interface LoggerHandle {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

// ── Policy ──────────────────────────────────────────────────

export interface AgentEndpoint {
  readonly name: string;
  readonly description: string;
  readonly invocationTarget: string;
  readonly allowedDestinations: readonly string[];
  readonly timeoutMs: number;
  readonly maxResultBytes: number;
  readonly requiredArguments: readonly string[];
}

export interface ApiKey {
  readonly keyId: string;
  readonly secretHash: string;
  /** Tool names this key may dispatch. Empty = chat only. */
  readonly scope: readonly string[];
  readonly revoked: boolean;
}

// ── Tool Calls ──────────────────────────────────────────────

export interface ToolCallRequest {
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly correlationId: string;
  readonly callId: string;
}

export interface AgentSource {
  readonly url: string;
  readonly title: string;
}

export interface SourceAnomaly {
  readonly kind: 'disallowed_source';
  readonly url: string;
}

export interface AgentSuccess {
  readonly ok: true;
  readonly summary: string;
  readonly structuredSnippets: readonly string[];
  readonly sources: readonly AgentSource[];
  /** Set when the result was cut to the endpoint's maxResultBytes. */
  readonly partial: boolean;
  readonly anomalies: readonly SourceAnomaly[];
}

export type AgentFailureKind =
  | 'policy'
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'timeout'
  | 'transport'
  | 'invalid_response';

export interface AgentFailure {
  readonly ok: false;
  readonly kind: AgentFailureKind;
  readonly message: string;
}

export type AgentResult = AgentSuccess | AgentFailure;

// ── Turns ───────────────────────────────────────────────────

export interface ToolCallEntry {
  readonly request: ToolCallRequest;
  readonly result: AgentResult;
}

export type TurnOutcome = 'answered' | 'upstream_error' | 'internal_error';

export interface TurnRecord {
  readonly correlationId: string;
  readonly promptSummary: string;
  readonly toolCalls: readonly ToolCallEntry[];
  readonly finalAnswerSummary: string;
  readonly outcome: TurnOutcome;
  readonly toolLoopExceeded: boolean;
  readonly createdAt: Date;
  readonly sealedAt: Date;
}

export type TurnState =
  | 'received'
  | 'awaiting_worker'
  | 'tool_requested'
  | 'awaiting_agent'
  | 'finalized'
  | 'sealed';

// ── Watchdog ────────────────────────────────────────────────

export const RISK_LEVELS = ['low', 'medium', 'high'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const RISK_REASONS = [
  'possible_data_exfil',
  'destructive_command',
  'jailbreak_probe',
  'out_of_policy',
  'agent_anomaly',
] as const;
export type RiskReason = (typeof RISK_REASONS)[number];

export interface WatchdogVerdict {
  readonly correlationId: string;
  readonly riskLevel: RiskLevel | 'unknown';
  readonly reasons: readonly RiskReason[];
  readonly notes: string;
  readonly producedAt: Date;
  /** True when scoring failed or timed out; riskLevel is then 'unknown'. */
  readonly unavailable: boolean;
}

// ── Worker Model Protocol ───────────────────────────────────

export interface ToolDescriptor {
  name: string;
  description: string;
  requiredArguments: readonly string[];
}

export type ConversationMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string }
  | { role: 'tool_call'; callId: string; toolName: string; arguments: Readonly<Record<string, unknown>>; text?: string }
  | { role: 'tool_result'; callId: string; content: string; isError: boolean };

export interface WorkerRequest {
  correlationId: string;
  systemPrompt: string;
  conversationHistory: readonly ConversationMessage[];
  availableTools: readonly ToolDescriptor[];
}

export type WorkerResponse =
  | { type: 'answer'; text: string }
  | { type: 'tool_call'; callId: string; toolName: string; arguments: Record<string, unknown>; text?: string };

export interface WorkerModel {
  complete(request: WorkerRequest): Promise<WorkerResponse>;
}

// ── Watchdog Model Protocol ─────────────────────────────────

export interface ScoringRequest {
  correlationId: string;
  promptSummary: string;
  answerSummary: string;
  toolsUsed: string[];
  anomalyCount: number;
}

export interface ScoringModel {
  /** Returns the raw, unvalidated verdict payload. */
  score(request: ScoringRequest, signal: AbortSignal): Promise<unknown>;
}

// ── Zod Schemas for Runtime Validation ──────────────────────

export const TurnRequestSchema = z.object({
  prompt: z.string().min(1).max(32_000),
  apiKey: z.string().min(1),
});

export const AgentResponseSchema = z.object({
  summary: z.string(),
  snippets: z.array(z.string()).optional().default([]),
  sources: z
    .array(z.object({ url: z.string(), title: z.string().optional().default('') }))
    .optional()
    .default([]),
});

export const VerdictPayloadSchema = z.object({
  riskLevel: z.enum(RISK_LEVELS),
  reasons: z.array(z.string()).optional().default([]),
  notes: z.string().optional().default(''),
});
